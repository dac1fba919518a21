/**
 * Alert condition language.
 *
 *   expr    := orExpr
 *   orExpr  := andExpr ('or' andExpr)*
 *   andExpr := notExpr ('and' notExpr)*
 *   notExpr := 'not' notExpr | compare
 *   compare := operand (('<' | '<=' | '>' | '>=' | '==' | '!=') operand)?
 *   operand := '-'? NUMBER | VARIABLE | '(' expr ')'
 *
 * Keywords and variable names are case-insensitive. A compiled condition is a
 * type-checked AST evaluated by direct interpretation; nothing is ever passed
 * to a host evaluator.
 */
import { AlertConditionError } from './errors.js';
import { type SeeingReport } from './seeing-report.js';

export const ALERT_VARIABLES = ['score', 'cloud_cover', 'wind_speed', 'humidity', 'temperature', 'moon_illumination', 'moon_altitude'] as const;
export type AlertVariable = (typeof ALERT_VARIABLES)[number];
export type AlertContext = Readonly<Record<AlertVariable, number>>;

const COMPARISON_OPERATORS = ['<=', '>=', '==', '!=', '<', '>'] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

type Keyword = 'and' | 'or' | 'not';

type Token =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'variable'; name: AlertVariable; position: number }
  | { kind: 'keyword'; keyword: Keyword; position: number }
  | { kind: 'operator'; operator: ComparisonOperator; position: number }
  | { kind: 'minus'; position: number }
  | { kind: 'lparen'; position: number }
  | { kind: 'rparen'; position: number }
  | { kind: 'end'; position: number };

export type AlertExpression =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'variable'; name: AlertVariable; position: number }
  | { kind: 'compare'; operator: ComparisonOperator; left: AlertExpression; right: AlertExpression; position: number }
  | { kind: 'logical'; operator: 'and' | 'or'; left: AlertExpression; right: AlertExpression; position: number }
  | { kind: 'not'; operand: AlertExpression; position: number };

type ValueType = 'number' | 'boolean';

const isAlertVariable = (name: string): name is AlertVariable => ALERT_VARIABLES.some((variable) => variable === name);

const isKeyword = (name: string): name is Keyword => name === 'and' || name === 'or' || name === 'not';

const NUMBER_PATTERN = /^\d+(\.\d*)?|^\.\d+/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

export const tokenizeAlertCondition = (source: string): Token[] => {
  const tokens: Token[] = [];
  let position = 0;

  while (position < source.length) {
    const rest = source.slice(position);
    const char = rest[0];

    if (/\s/.test(char)) {
      position += 1;
      continue;
    }

    const numberMatch = NUMBER_PATTERN.exec(rest);
    if (numberMatch) {
      tokens.push({ kind: 'number', value: Number(numberMatch[0]), position });
      position += numberMatch[0].length;
      continue;
    }

    const identifierMatch = IDENTIFIER_PATTERN.exec(rest);
    if (identifierMatch) {
      const word = identifierMatch[0].toLowerCase();
      if (isKeyword(word)) {
        tokens.push({ kind: 'keyword', keyword: word, position });
      } else if (isAlertVariable(word)) {
        tokens.push({ kind: 'variable', name: word, position });
      } else {
        throw new AlertConditionError(`Unknown variable "${identifierMatch[0]}"`, position);
      }
      position += identifierMatch[0].length;
      continue;
    }

    const operator = COMPARISON_OPERATORS.find((candidate) => rest.startsWith(candidate));
    if (operator) {
      tokens.push({ kind: 'operator', operator, position });
      position += operator.length;
      continue;
    }

    if (char === '(') tokens.push({ kind: 'lparen', position });
    else if (char === ')') tokens.push({ kind: 'rparen', position });
    else if (char === '-') tokens.push({ kind: 'minus', position });
    else throw new AlertConditionError(`Unexpected character "${char}"`, position);
    position += 1;
  }

  tokens.push({ kind: 'end', position });
  return tokens;
};

const describeToken = (token: Token): string => {
  switch (token.kind) {
    case 'number':
      return `number ${token.value}`;
    case 'variable':
      return `"${token.name}"`;
    case 'keyword':
      return `"${token.keyword}"`;
    case 'operator':
      return `"${token.operator}"`;
    case 'minus':
      return '"-"';
    case 'lparen':
      return '"("';
    case 'rparen':
      return '")"';
    case 'end':
      return 'end of condition';
  }
};

const parseTokens = (tokens: readonly Token[]): AlertExpression => {
  let index = 0;
  const peek = (): Token => tokens[Math.min(index, tokens.length - 1)];
  const advance = (): Token => {
    const token = peek();
    index += 1;
    return token;
  };
  const unexpected = (token: Token): AlertConditionError => new AlertConditionError(`Unexpected ${describeToken(token)}`, token.position);

  const isKeywordToken = (token: Token, keyword: Keyword): boolean => token.kind === 'keyword' && token.keyword === keyword;

  const parseOperand = (): AlertExpression => {
    const token = advance();
    switch (token.kind) {
      case 'number':
        return { kind: 'number', value: token.value, position: token.position };
      case 'variable':
        return { kind: 'variable', name: token.name, position: token.position };
      case 'minus': {
        const next = advance();
        if (next.kind !== 'number') throw unexpected(next);
        return { kind: 'number', value: -next.value, position: token.position };
      }
      case 'lparen': {
        const inner = parseOr();
        const closing = advance();
        if (closing.kind !== 'rparen') throw unexpected(closing);
        return inner;
      }
      default:
        throw unexpected(token);
    }
  };

  const parseCompare = (): AlertExpression => {
    const left = parseOperand();
    const next = peek();
    if (next.kind !== 'operator') return left;
    advance();
    const right = parseOperand();
    return { kind: 'compare', operator: next.operator, left, right, position: next.position };
  };

  const parseNot = (): AlertExpression => {
    const token = peek();
    if (isKeywordToken(token, 'not')) {
      advance();
      return { kind: 'not', operand: parseNot(), position: token.position };
    }
    return parseCompare();
  };

  const parseAnd = (): AlertExpression => {
    let left = parseNot();
    while (isKeywordToken(peek(), 'and')) {
      const token = advance();
      left = { kind: 'logical', operator: 'and', left, right: parseNot(), position: token.position };
    }
    return left;
  };

  function parseOr(): AlertExpression {
    let left = parseAnd();
    while (isKeywordToken(peek(), 'or')) {
      const token = advance();
      left = { kind: 'logical', operator: 'or', left, right: parseAnd(), position: token.position };
    }
    return left;
  }

  const expression = parseOr();
  const trailing = peek();
  if (trailing.kind !== 'end') throw unexpected(trailing);
  return expression;
};

const expectType = (node: AlertExpression, expected: ValueType): void => {
  const actual = checkType(node);
  if (actual !== expected) {
    throw new AlertConditionError(`Expected a ${expected} but found a ${actual}`, node.position);
  }
};

const checkType = (node: AlertExpression): ValueType => {
  switch (node.kind) {
    case 'number':
    case 'variable':
      return 'number';
    case 'compare':
      expectType(node.left, 'number');
      expectType(node.right, 'number');
      return 'boolean';
    case 'logical':
      expectType(node.left, 'boolean');
      expectType(node.right, 'boolean');
      return 'boolean';
    case 'not':
      expectType(node.operand, 'boolean');
      return 'boolean';
  }
};

export const parseAlertCondition = (source: string): AlertExpression => {
  const tokens = tokenizeAlertCondition(source);
  if (tokens.length === 1) {
    throw new AlertConditionError('Condition is empty', 0);
  }
  const expression = parseTokens(tokens);
  expectType(expression, 'boolean');
  return expression;
};

const compare = (operator: ComparisonOperator, left: number, right: number): boolean => {
  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '==':
      return left === right;
    case '!=':
      return left !== right;
  }
};

const evaluateNumber = (node: AlertExpression, context: AlertContext): number => {
  if (node.kind === 'number') return node.value;
  if (node.kind === 'variable') return context[node.name];
  throw new AlertConditionError('Expected a number but found a boolean', node.position);
};

const evaluateBoolean = (node: AlertExpression, context: AlertContext): boolean => {
  switch (node.kind) {
    case 'compare':
      return compare(node.operator, evaluateNumber(node.left, context), evaluateNumber(node.right, context));
    case 'logical':
      return node.operator === 'and'
        ? evaluateBoolean(node.left, context) && evaluateBoolean(node.right, context)
        : evaluateBoolean(node.left, context) || evaluateBoolean(node.right, context);
    case 'not':
      return !evaluateBoolean(node.operand, context);
    default:
      throw new AlertConditionError('Expected a boolean but found a number', node.position);
  }
};

export interface CompiledAlertCondition {
  readonly source: string;
  readonly expression: AlertExpression;
  evaluate: (context: AlertContext) => boolean;
}

export const compileAlertCondition = (source: string): CompiledAlertCondition => {
  const expression = parseAlertCondition(source);
  return {
    source,
    expression,
    evaluate: (context) => evaluateBoolean(expression, context),
  };
};

export const alertContextFromReport = (report: SeeingReport): AlertContext => ({
  score: report.score.totalScore,
  cloud_cover: report.weather.cloudCover,
  wind_speed: report.weather.windSpeed10m,
  humidity: report.weather.humidity,
  temperature: report.weather.temperature,
  moon_illumination: report.astronomy.moonIllumination,
  moon_altitude: report.astronomy.moonAltitude,
});

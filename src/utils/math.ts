export type Knot = readonly [input: number, output: number];

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const clampScore = (value: number): number => clamp(value, 0, 100);

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export const linearInterpolate = (value: number, inLow: number, inHigh: number, outLow: number, outHigh: number): number => {
  if (inHigh === inLow) {
    return outLow;
  }
  return outLow + ((value - inLow) / (inHigh - inLow)) * (outHigh - outLow);
};

/**
 * Piecewise-linear lookup over ascending knots. Values outside the table take
 * the nearest end knot's output.
 */
export const interpolateKnots = (value: number, knots: readonly Knot[]): number => {
  if (knots.length === 0) {
    throw new RangeError('interpolateKnots requires at least one knot');
  }
  const [firstInput, firstOutput] = knots[0];
  if (value <= firstInput) return firstOutput;

  for (let index = 1; index < knots.length; index += 1) {
    const [inHigh, outHigh] = knots[index];
    if (value <= inHigh) {
      const [inLow, outLow] = knots[index - 1];
      return linearInterpolate(value, inLow, inHigh, outLow, outHigh);
    }
  }
  return knots[knots.length - 1][1];
};

export const average = (values: readonly number[]): number | null => {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

export const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;
export const toDegrees = (radians: number): number => (radians * 180) / Math.PI;

export const normalizeDegrees = (degrees: number): number => {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
};

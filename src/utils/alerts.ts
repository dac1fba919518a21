import { alertContextFromReport, compileAlertCondition, type CompiledAlertCondition } from './alert-conditions.js';
import { getSeeingRating } from './scoring.js';
import { type SeeingReport } from './seeing-report.js';

export interface AlertRule {
  readonly condition: string;
  readonly enabled: boolean;
  readonly notify: boolean;
}

export interface TriggeredAlert extends AlertRule {
  readonly index: number;
  readonly message: string;
}

interface StoredAlert extends AlertRule {
  compiled: CompiledAlertCondition;
}

interface AddAlertOptions {
  enabled?: boolean;
  notify?: boolean;
}

export interface AlertService {
  add: (condition: string, options?: AddAlertOptions) => AlertRule;
  remove: (index: number) => boolean;
  list: () => AlertRule[];
  evaluate: (report: SeeingReport) => TriggeredAlert[];
}

const toRule = ({ condition, enabled, notify }: StoredAlert): AlertRule => ({ condition, enabled, notify });

export const formatAlertMessage = (report: SeeingReport): string =>
  `Seeing score ${report.score.totalScore.toFixed(0)} (${getSeeingRating(report.score.totalScore)}) at ${report.location.name}`;

/** Conditions are compiled on add, so a bad expression never reaches the list. */
export const createAlertService = (): AlertService => {
  const alerts: StoredAlert[] = [];

  return {
    add: (condition, { enabled = true, notify = true } = {}) => {
      const stored: StoredAlert = { condition, enabled, notify, compiled: compileAlertCondition(condition) };
      alerts.push(stored);
      return toRule(stored);
    },

    remove: (index) => {
      if (!Number.isInteger(index) || index < 0 || index >= alerts.length) return false;
      alerts.splice(index, 1);
      return true;
    },

    list: () => alerts.map(toRule),

    evaluate: (report) => {
      const context = alertContextFromReport(report);
      const message = formatAlertMessage(report);
      const triggered: TriggeredAlert[] = [];

      alerts.forEach((alert, index) => {
        if (!alert.enabled || !alert.compiled.evaluate(context)) return;
        triggered.push({ ...toRule(alert), index, message });
        if (alert.notify) {
          console.log(`[Alerts] ${message}. Condition met: ${alert.condition}`);
        }
      });

      return triggered;
    },
  };
};

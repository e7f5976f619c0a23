/**
 * ALERT EVALUATOR
 *
 * Stateless classification of alert rules against a metric frame.
 * Used by the stateful cycle, dry runs, summaries and the dashboard.
 */

import {
  ExpressionError,
  compileExpression,
  evaluate,
  isTruthy,
} from '../../expression/index.js';
import { errorMessage } from '../../../common/errors.js';
import type { AlertDefinition, MonitorConfig, Severity } from '../../../config/monitor.config.js';
import type { MetricFrame } from '../../metrics/contracts/metrics.contracts.js';
import { lastValidIndex } from '../../metrics/services/metrics.frame.js';
import { makeAlertId } from './alert.identity.js';
import type { AlertContext, AlertEvaluation, Classification } from '../contracts/alert.types.js';

export interface ContextSnapshot {
  date: string;
  context: AlertContext;
}

/**
 * Context on the latest date the target has a value: `value` and every
 * configured statistic name bound to `<key>_<name>` on that date.
 */
export function buildAlertContext(
  frame: MetricFrame,
  key: string,
  statNames: readonly string[]
): ContextSnapshot | null {
  const column = frame.columns.get(key);
  if (!column) return null;

  const index = lastValidIndex(column);
  if (index < 0) return null;

  const context: AlertContext = { value: column[index] };
  for (const name of statNames) {
    context[name] = frame.columns.get(`${key}_${name}`)?.[index] ?? null;
  }

  return { date: frame.dates[index], context };
}

/**
 * BREACH when the rule is truthy, OK when falsy. Any expression error,
 * division by zero or non-finite result is UNKNOWN with a reason.
 */
export function evaluateRule(
  rule: string,
  context: AlertContext
): { classification: Classification; reason?: string } {
  try {
    const compiled = compileExpression(rule, Object.keys(context));
    const result = evaluate(compiled, context, { divisionByZero: 'error' });

    if (typeof result === 'number' && !Number.isFinite(result)) {
      return { classification: 'UNKNOWN', reason: `Rule produced a non-finite value (${result})` };
    }
    return { classification: isTruthy(result) ? 'BREACH' : 'OK' };
  } catch (err) {
    const reason = err instanceof ExpressionError ? `${err.kind}: ${err.message}` : errorMessage(err);
    return { classification: 'UNKNOWN', reason };
  }
}

export function evaluateAlert(def: AlertDefinition, frame: MetricFrame, config: MonitorConfig): AlertEvaluation {
  const { label, unit } = config.describe(def.key);
  const base = {
    alertId: makeAlertId(def),
    key: def.key,
    label,
    unit,
    rule: def.rule,
    severity: def.severity,
    category: def.category,
    note: def.note,
  };

  const snapshot = buildAlertContext(frame, def.key, config.metricSuffixes);
  if (!snapshot) {
    return {
      ...base,
      classification: 'UNKNOWN',
      value: null,
      date: null,
      context: {},
      reason: `No data available for "${def.key}"`,
    };
  }

  const { classification, reason } = evaluateRule(def.rule, snapshot.context);
  return {
    ...base,
    classification,
    value: snapshot.context.value,
    date: snapshot.date,
    context: snapshot.context,
    ...(reason ? { reason } : {}),
  };
}

/**
 * Every configured rule in configuration order, optionally restricted to
 * some severities.
 */
export function evaluateAllAlerts(
  frame: MetricFrame,
  config: MonitorConfig,
  severities?: readonly Severity[]
): AlertEvaluation[] {
  return config.alerts
    .filter(def => !severities || severities.includes(def.severity))
    .map(def => evaluateAlert(def, frame, config));
}

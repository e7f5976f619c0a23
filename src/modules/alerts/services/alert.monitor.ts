/**
 * ALERT MONITOR
 * =============
 *
 * Stateful alert cycle:
 * - Classify every rule (OK / BREACH / UNKNOWN)
 * - Compare with persisted state (no row = OK)
 * - Write state, log transitions
 * - Notify on OK -> BREACH only
 *
 * Rules are processed one at a time in configuration order. A failure on one
 * rule is recorded and the cycle moves on.
 */

import { v4 as uuidv4 } from 'uuid';
import { systemClock, type Clock } from '../../../common/dates.js';
import { errorMessage } from '../../../common/errors.js';
import { noopLogger, type Logger } from '../../../common/logger.js';
import { SEVERITIES, type MonitorConfig } from '../../../config/monitor.config.js';
import type { MetricsResult } from '../../metrics/contracts/metrics.contracts.js';
import { evaluateAllAlerts } from './alert.evaluator.js';
import type {
  AlertEvaluation,
  AlertNotifier,
  AlertState,
  AlertStore,
  BreachSummary,
  CycleItem,
  CycleOptions,
  CycleReport,
  NotificationOutcome,
} from '../contracts/alert.types.js';

export interface MetricsSource {
  calculateAll(): Promise<MetricsResult>;
}

export interface AlertMonitorDeps {
  config: MonitorConfig;
  metrics: MetricsSource;
  store: AlertStore;
  notifier?: AlertNotifier;
  logger?: Logger;
  clock?: Clock;
}

export class AlertMonitor {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: AlertMonitorDeps) {
    this.logger = deps.logger ?? noopLogger;
    this.clock = deps.clock ?? systemClock;
  }

  // ═══════════════════════════════════════════════════════════════
  // STATELESS
  // ═══════════════════════════════════════════════════════════════

  async evaluateAll(): Promise<AlertEvaluation[]> {
    const { frame } = await this.deps.metrics.calculateAll();
    return evaluateAllAlerts(frame, this.deps.config);
  }

  async getCurrentBreaches(): Promise<AlertEvaluation[]> {
    const results = await this.evaluateAll();
    return results.filter(r => r.classification === 'BREACH');
  }

  async getBreachSummary(): Promise<BreachSummary> {
    return groupBySeverity(await this.getCurrentBreaches());
  }

  // ═══════════════════════════════════════════════════════════════
  // STATEFUL CYCLE
  // ═══════════════════════════════════════════════════════════════

  async runCycle(options: CycleOptions = {}): Promise<CycleReport> {
    const dryRun = options.dryRun ?? false;
    const severities = [...(options.severities ?? this.deps.config.alertingSeverities)];

    const { frame } = await this.deps.metrics.calculateAll();
    const evaluations = evaluateAllAlerts(frame, this.deps.config, severities);

    const report: CycleReport = {
      dryRun,
      severities,
      evaluated: evaluations.length,
      unknown: 0,
      transitions: 0,
      newBreaches: [],
      notificationsSent: 0,
      notificationsFailed: 0,
      errors: [],
      items: [],
    };

    for (const evaluation of evaluations) {
      const item = await this.processEvaluation(evaluation, dryRun);
      report.items.push(item);

      if (evaluation.classification === 'UNKNOWN') report.unknown++;
      if (item.transitioned) report.transitions++;
      if (item.transitioned && item.newState === 'BREACH') report.newBreaches.push(evaluation);
      if (item.notification === 'SENT') report.notificationsSent++;
      if (item.notification === 'FAILED') report.notificationsFailed++;
      if (item.error) report.errors.push({ alertId: evaluation.alertId, error: item.error });
    }

    this.logger.info(
      {
        dryRun,
        severities,
        evaluated: report.evaluated,
        unknown: report.unknown,
        transitions: report.transitions,
        newBreaches: report.newBreaches.length,
        notificationsSent: report.notificationsSent,
        notificationsFailed: report.notificationsFailed,
        errors: report.errors.length,
      },
      '[AlertMonitor] Cycle complete'
    );

    return report;
  }

  private async processEvaluation(evaluation: AlertEvaluation, dryRun: boolean): Promise<CycleItem> {
    const { alertId, classification } = evaluation;

    if (classification === 'UNKNOWN') {
      this.logger.warn({ alertId, reason: evaluation.reason }, '[AlertMonitor] Rule could not be evaluated');
      return { evaluation, previousState: null, newState: null, transitioned: false, notification: 'NONE' };
    }

    let previousState: AlertState | null = null;
    let transitioned = false;
    let notification: NotificationOutcome = 'NONE';

    try {
      const stored = await this.deps.store.getState(alertId);
      const previous: AlertState = stored?.state ?? 'OK';
      previousState = previous;
      transitioned = classification !== previous;

      if (dryRun) {
        return { evaluation, previousState, newState: classification, transitioned, notification };
      }

      const now = this.clock.now();
      await this.deps.store.saveState({
        alertId,
        key: evaluation.key,
        severity: evaluation.severity,
        state: classification,
        lastValue: evaluation.value,
        lastTransitionTime: transitioned ? now : (stored?.lastTransitionTime ?? null),
        lastEvaluatedAt: now,
      });

      if (!transitioned) {
        return { evaluation, previousState, newState: classification, transitioned, notification };
      }

      this.logger.info(
        { alertId, from: previous, to: classification, value: evaluation.value },
        '[AlertMonitor] State transition'
      );

      if (classification === 'BREACH') {
        notification = await this.notify(evaluation);
      }

      await this.deps.store.appendLog({
        logId: uuidv4(),
        alertId,
        key: evaluation.key,
        severity: evaluation.severity,
        stateFrom: previous,
        stateTo: classification,
        value: evaluation.value,
        note: evaluation.note,
        notification,
        triggeredAt: now,
      });

      return { evaluation, previousState, newState: classification, transitioned, notification };
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error({ alertId, error }, '[AlertMonitor] Alert processing failed');
      return { evaluation, previousState, newState: classification, transitioned, notification, error };
    }
  }

  private async notify(evaluation: AlertEvaluation): Promise<NotificationOutcome> {
    if (!this.deps.notifier) return 'SKIPPED';

    try {
      return await this.deps.notifier.sendAlert(evaluation);
    } catch (err) {
      this.logger.error(
        { alertId: evaluation.alertId, error: errorMessage(err) },
        '[AlertMonitor] Notification failed'
      );
      return 'FAILED';
    }
  }
}

export function groupBySeverity(evaluations: AlertEvaluation[]): BreachSummary {
  const summary: BreachSummary = { critical: [], warning: [], info: [] };
  for (const severity of SEVERITIES) {
    summary[severity] = evaluations.filter(e => e.severity === severity);
  }
  return summary;
}

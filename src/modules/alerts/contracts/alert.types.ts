/**
 * ALERTS MODULE — Types
 */

import type { Severity } from '../../../config/monitor.config.js';

export type { Severity };

export type AlertState = 'OK' | 'BREACH';
export type Classification = AlertState | 'UNKNOWN';
export type NotificationOutcome = 'SENT' | 'FAILED' | 'SKIPPED' | 'NONE';

/**
 * `value` plus every configured change/rolling name on the target's latest
 * date. Null means declared but absent.
 */
export type AlertContext = Record<string, number | null>;

// ═══════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════

export interface AlertEvaluation {
  alertId: string;
  key: string;
  label: string;
  unit: string;
  rule: string;
  severity: Severity;
  category: string;
  note: string;
  classification: Classification;
  value: number | null;
  date: string | null;
  context: AlertContext;
  reason?: string;
}

export type BreachSummary = Record<Severity, AlertEvaluation[]>;

// ═══════════════════════════════════════════════════════════════
// PERSISTENCE
// ═══════════════════════════════════════════════════════════════

export interface AlertStateRecord {
  alertId: string;
  key: string;
  severity: Severity;
  state: AlertState;
  lastValue: number | null;
  lastTransitionTime: Date | null;
  lastEvaluatedAt: Date;
}

export interface AlertTransitionLogEntry {
  logId: string;
  alertId: string;
  key: string;
  severity: Severity;
  stateFrom: AlertState;
  stateTo: AlertState;
  value: number | null;
  note: string;
  notification: NotificationOutcome;
  triggeredAt: Date;
}

export interface AlertStore {
  getState(alertId: string): Promise<AlertStateRecord | null>;
  saveState(record: AlertStateRecord): Promise<void>;
  listStates(): Promise<AlertStateRecord[]>;
  appendLog(entry: AlertTransitionLogEntry): Promise<void>;
  /** Most recent first. */
  getHistory(limit: number): Promise<AlertTransitionLogEntry[]>;
}

/**
 * Delivers a new-breach notification and reports how it went.
 */
export interface AlertNotifier {
  sendAlert(evaluation: AlertEvaluation): Promise<NotificationOutcome>;
}

// ═══════════════════════════════════════════════════════════════
// CYCLE
// ═══════════════════════════════════════════════════════════════

export interface CycleOptions {
  /** Severities to process; defaults to the configured alerting severities. */
  severities?: readonly Severity[];
  /** Evaluate and diff against stored state without writing or notifying. */
  dryRun?: boolean;
}

export interface CycleItem {
  evaluation: AlertEvaluation;
  previousState: AlertState | null;
  newState: AlertState | null;
  transitioned: boolean;
  notification: NotificationOutcome;
  error?: string;
}

export interface CycleReport {
  dryRun: boolean;
  severities: Severity[];
  evaluated: number;
  unknown: number;
  transitions: number;
  newBreaches: AlertEvaluation[];
  notificationsSent: number;
  notificationsFailed: number;
  errors: Array<{ alertId: string; error: string }>;
  items: CycleItem[];
}

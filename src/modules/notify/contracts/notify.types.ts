/**
 * NOTIFY MODULE — Types
 */

export interface SendResult {
  ok: boolean;
  error?: string;
  messageId?: number;
}

/**
 * A channel that delivers formatted text.
 */
export interface NotificationTransport {
  readonly name: string;
  /** False when disabled or missing credentials; send() is not attempted. */
  isConfigured(): boolean;
  send(text: string): Promise<SendResult>;
}

export interface SignificantChange {
  key: string;
  label: string;
  unit: string;
  value: number;
  d1: number;
}

export type SummaryOutcome = 'SENT' | 'FAILED' | 'SKIPPED' | 'NOTHING_TO_SEND';

export interface DailySummaryResult {
  outcome: SummaryOutcome;
  changes: SignificantChange[];
  error?: string;
}

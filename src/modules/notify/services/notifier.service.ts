/**
 * NOTIFIER SERVICE
 *
 * Formats alert and summary messages and hands them to a transport.
 * Delivery problems are logged and returned as outcomes, never thrown.
 */

import { systemClock, type Clock } from '../../../common/dates.js';
import { errorMessage } from '../../../common/errors.js';
import { noopLogger, type Logger } from '../../../common/logger.js';
import type { MonitorConfig } from '../../../config/monitor.config.js';
import type {
  AlertEvaluation,
  AlertNotifier,
  NotificationOutcome,
} from '../../alerts/contracts/alert.types.js';
import type { LatestValues } from '../../metrics/contracts/metrics.contracts.js';
import type {
  DailySummaryResult,
  NotificationTransport,
  SendResult,
} from '../contracts/notify.types.js';
import {
  findSignificantChanges,
  formatAlertMessage,
  formatDailySummary,
  formatTestMessage,
  type MessageContext,
} from './message.builder.js';

export interface NotifierServiceDeps {
  config: MonitorConfig;
  transport: NotificationTransport;
  logger?: Logger;
  clock?: Clock;
}

export class NotifierService implements AlertNotifier {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: NotifierServiceDeps) {
    this.logger = deps.logger ?? noopLogger;
    this.clock = deps.clock ?? systemClock;
  }

  isConfigured(): boolean {
    return this.deps.transport.isConfigured();
  }

  private messageContext(): MessageContext {
    return { timezone: this.deps.config.timezone, now: this.clock.now() };
  }

  /**
   * SKIPPED when the transport is not configured, SENT or FAILED otherwise.
   */
  async sendAlert(evaluation: AlertEvaluation): Promise<NotificationOutcome> {
    const { transport } = this.deps;
    if (!transport.isConfigured()) {
      this.logger.warn(
        { alertId: evaluation.alertId, transport: transport.name },
        '[Notifier] Transport not configured, notification skipped'
      );
      return 'SKIPPED';
    }

    const result = await this.deliver(formatAlertMessage(evaluation, this.messageContext()));
    if (result.ok) {
      this.logger.info({ alertId: evaluation.alertId, messageId: result.messageId }, '[Notifier] Alert sent');
      return 'SENT';
    }

    this.logger.error({ alertId: evaluation.alertId, error: result.error }, '[Notifier] Alert delivery failed');
    return 'FAILED';
  }

  /**
   * Sends the significant 1-day changes in `latest`. Nothing is sent when
   * there are none.
   */
  async sendDailySummary(latest: LatestValues): Promise<DailySummaryResult> {
    const changes = findSignificantChanges(latest);
    if (changes.length === 0) {
      this.logger.info({}, '[Notifier] No significant changes today');
      return { outcome: 'NOTHING_TO_SEND', changes };
    }

    if (!this.deps.transport.isConfigured()) {
      this.logger.warn({ changes: changes.length }, '[Notifier] Transport not configured, summary skipped');
      return { outcome: 'SKIPPED', changes };
    }

    const result = await this.deliver(formatDailySummary(changes, this.messageContext()));
    if (!result.ok) {
      this.logger.error({ error: result.error }, '[Notifier] Daily summary delivery failed');
      return { outcome: 'FAILED', changes, error: result.error };
    }

    this.logger.info({ changes: changes.length }, '[Notifier] Daily summary sent');
    return { outcome: 'SENT', changes };
  }

  async testConnection(): Promise<SendResult> {
    if (!this.deps.transport.isConfigured()) {
      return { ok: false, error: `${this.deps.transport.name} is disabled or missing credentials` };
    }
    return this.deliver(formatTestMessage());
  }

  private async deliver(text: string): Promise<SendResult> {
    try {
      return await this.deps.transport.send(text);
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}

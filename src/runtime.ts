/**
 * RUNTIME
 *
 * Builds every service from one loaded configuration. The server, the CLI
 * and the scheduler all go through here; nothing reads config globally.
 */

import type { Clock } from './common/dates.js';
import type { Logger } from './common/logger.js';
import { resolveSecret, type MonitorConfig } from './config/monitor.config.js';
import type { AlertStore } from './modules/alerts/contracts/alert.types.js';
import { AlertMonitor } from './modules/alerts/services/alert.monitor.js';
import { MongoAlertStore } from './modules/alerts/storage/mongo.alert.store.js';
import { DashboardService } from './modules/dashboard/services/dashboard.service.js';
import { MetricsService } from './modules/metrics/services/metrics.service.js';
import type { NotificationTransport } from './modules/notify/contracts/notify.types.js';
import { NotifierService } from './modules/notify/services/notifier.service.js';
import { TelegramTransport } from './modules/notify/services/telegram.transport.js';
import type { JobHandlers } from './modules/scheduler/scheduler.service.js';
import type { SeriesStore } from './modules/series/contracts/series.contracts.js';
import { FredClient } from './modules/series/ingest/fred.client.js';
import { IngestService, type SeriesFetcher } from './modules/series/ingest/ingest.service.js';
import { MongoSeriesStore } from './modules/series/storage/mongo.series.store.js';

/** Days re-fetched by the weekly job to pick up revisions. */
export const WEEKLY_BACKFILL_DAYS = 14;

export interface RuntimeOptions {
  config: MonitorConfig;
  logger: Logger;
  secrets?: NodeJS.ProcessEnv;
  seriesStore?: SeriesStore;
  alertStore?: AlertStore;
  fetcher?: SeriesFetcher;
  transport?: NotificationTransport;
  clock?: Clock;
}

export interface Runtime {
  config: MonitorConfig;
  logger: Logger;
  seriesStore: SeriesStore;
  alertStore: AlertStore;
  fred: FredClient;
  ingest: IngestService;
  metrics: MetricsService;
  monitor: AlertMonitor;
  notifier: NotifierService;
  dashboard: DashboardService;
  jobs: JobHandlers;
  close(): Promise<void>;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const { config, logger, clock } = options;
  const secrets = options.secrets ?? process.env;

  const seriesStore = options.seriesStore ?? new MongoSeriesStore();
  const alertStore = options.alertStore ?? new MongoAlertStore();

  const fred = new FredClient({
    apiKey: resolveSecret(config.fred.apiKeyEnv, secrets),
    source: config.fred,
    logger,
  });

  const metrics = new MetricsService({ config, store: seriesStore, logger });

  const ingest = new IngestService({
    config,
    store: seriesStore,
    fetcher: options.fetcher ?? fred,
    derived: metrics,
    logger,
    clock,
  });

  const telegram = config.telegram;
  const transport =
    options.transport ??
    new TelegramTransport({
      enabled: telegram.enabled,
      botToken: resolveSecret(telegram.botTokenEnv, secrets),
      chatId: resolveSecret(telegram.chatIdEnv, secrets),
      parseMode: telegram.parseMode,
      timeoutMs: telegram.timeoutMs,
      logger,
    });

  const notifier = new NotifierService({ config, transport, logger, clock });
  const monitor = new AlertMonitor({ config, metrics, store: alertStore, notifier, logger, clock });
  const dashboard = new DashboardService({ config, metrics, alerts: monitor, logger, clock });

  const jobs: JobHandlers = {
    fetchDaily: () => ingest.fetchAllSeries(),
    fetchWeekly: () => ingest.fetchAllSeries({ backfillDays: WEEKLY_BACKFILL_DAYS }),
    checkAlerts: () => monitor.runCycle(),
    dailySummary: async () => notifier.sendDailySummary(await metrics.getLatestValues()),
  };

  return {
    config,
    logger,
    seriesStore,
    alertStore,
    fred,
    ingest,
    metrics,
    monitor,
    notifier,
    dashboard,
    jobs,
    close: () => fred.close(),
  };
}


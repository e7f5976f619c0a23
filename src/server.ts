/**
 * FED MONITOR - HTTP entrypoint
 *
 * Connects MongoDB, builds the runtime, serves the API and optionally runs
 * the scheduler in the same process.
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import { buildApp } from './app.js';
import { errorMessage } from './common/errors.js';
import { createLogger } from './common/logger.js';
import { loadEnv } from './config/env.js';
import { loadMonitorConfig } from './config/monitor.config.js';
import { ensureIndexes } from './db/indexes.js';
import { connectMongo, disconnectMongo, mongoState } from './db/mongoose.js';
import { SchedulerService } from './modules/scheduler/scheduler.service.js';
import { createRuntime } from './runtime.js';

export interface StartServerOptions {
  withScheduler?: boolean;
}

export async function startServer(options: StartServerOptions = {}): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ level: env.LOG_LEVEL });
  const config = loadMonitorConfig(env.MONITOR_CONFIG_PATH);

  await connectMongo({ url: env.MONGO_URL, dbName: env.MONGO_DB, logger });
  await ensureIndexes(logger);

  const runtime = createRuntime({ config, logger });

  const app = buildApp({
    config,
    seriesStore: runtime.seriesStore,
    alertStore: runtime.alertStore,
    metrics: runtime.metrics,
    monitor: runtime.monitor,
    dashboard: runtime.dashboard,
    logLevel: env.LOG_LEVEL,
    corsOrigins: env.CORS_ORIGINS,
    exposeErrors: env.NODE_ENV !== 'production',
    healthChecks: () => ({
      mongo: mongoState(),
      fred: runtime.fred.hasApiKey() ? 'configured' : 'missing_api_key',
      telegram: runtime.notifier.isConfigured() ? 'configured' : 'disabled',
    }),
  });

  const scheduler =
    options.withScheduler || env.SCHEDULER_ENABLED
      ? new SchedulerService({ schedule: config.schedule, timezone: config.timezone, jobs: runtime.jobs, logger })
      : null;

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, '[Server] Shutting down');
    scheduler?.stop();
    await app.close();
    await runtime.close();
    await disconnectMongo();
    logger.info({}, '[Server] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(err => {
      logger.error({ error: errorMessage(err) }, '[Server] Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(err => {
      logger.error({ error: errorMessage(err) }, '[Server] Shutdown failed');
      process.exit(1);
    });
  });

  await app.listen({ port: env.PORT, host: env.HOST });

  if (scheduler) {
    const jobs = scheduler.start();
    logger.info({ jobs, timezone: config.timezone }, '[Server] Scheduler started');
  }

  logger.info(
    { port: env.PORT, configVersion: config.version, series: config.series.length, alerts: config.alerts.length },
    `[Server] Fed Monitor started on port ${env.PORT}`
  );
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  startServer().catch(err => {
    console.error('[Server] Fatal error:', err);
    process.exit(1);
  });
}

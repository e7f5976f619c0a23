#!/usr/bin/env node
/**
 * Fed Monitor CLI
 *
 * Fetch data, check alerts, export the dashboard, serve the API or run the
 * scheduler.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { createLogger, type Logger } from '../common/logger.js';
import { loadEnv, type Env } from '../config/env.js';
import { loadMonitorConfig } from '../config/monitor.config.js';
import { ensureIndexes } from '../db/indexes.js';
import { connectMongo, disconnectMongo } from '../db/mongoose.js';
import { SchedulerService } from '../modules/scheduler/scheduler.service.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { startServer } from '../server.js';
import {
  DEFAULT_EXPORT_FILE,
  runCheckAlertsCommand,
  runExportCommand,
  runFetchCommand,
  type Print,
} from './commands.js';

const VERSION = '1.0.0';

const print: Print = line => console.log(line);

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

interface Context {
  env: Env;
  logger: Logger;
  runtime: Runtime;
}

async function openContext(): Promise<Context> {
  const env = loadEnv();
  const logger = createLogger({ level: env.LOG_LEVEL, name: 'fed-monitor-cli' });
  const config = loadMonitorConfig(env.MONITOR_CONFIG_PATH);

  await connectMongo({ url: env.MONGO_URL, dbName: env.MONGO_DB, logger });
  await ensureIndexes(logger);

  return { env, logger, runtime: createRuntime({ config, logger }) };
}

async function closeContext(ctx: Context): Promise<void> {
  await ctx.runtime.close();
  await disconnectMongo();
}

/**
 * Runs a one-shot command against a connected runtime and exits with its code.
 */
async function runOnce(body: (runtime: Runtime) => Promise<number>): Promise<void> {
  const ctx = await openContext();
  const exitCode = await body(ctx.runtime).finally(() => closeContext(ctx));
  process.exit(exitCode);
}

async function runScheduler(): Promise<void> {
  const ctx = await openContext();
  const { config } = ctx.runtime;
  const scheduler = new SchedulerService({
    schedule: config.schedule,
    timezone: config.timezone,
    jobs: ctx.runtime.jobs,
    logger: ctx.logger,
  });

  const jobs = scheduler.start();
  for (const name of jobs) {
    const entry = config.schedule[name];
    print(`Scheduled: ${name} at ${entry?.cron ?? '?'} (${config.timezone})`);
  }
  if (jobs.length === 0) {
    print('No jobs configured under "schedule".');
    await closeContext(ctx);
    return;
  }

  const shutdown = async (signal: string) => {
    ctx.logger.info({ signal }, '[Scheduler] Stopping');
    scheduler.stop();
    await closeContext(ctx);
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        console.error('[Scheduler] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }
}

/**
 * Create the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('fed-monitor')
    .description('Fed monetary-policy monitor: FRED data, derived metrics and alerts')
    .version(VERSION, '-v, --version', 'Show version number');

  program
    .command('fetch')
    .description('Fetch FRED series and refresh derived metrics')
    .option('--backfill', 'Backfill historical data', false)
    .option('--years <n>', 'Years of history to backfill', positiveInt, 2)
    .option('--days <n>', 'Re-fetch the last N days', positiveInt)
    .option('--check', 'Only check FRED connectivity', false)
    .action(async (options: { backfill: boolean; years: number; days?: number; check: boolean }) => {
      await runOnce(rt => runFetchCommand(rt, options, print));
    });

  program
    .command('check-alerts')
    .description('Evaluate alerts, record transitions and notify on new breaches')
    .option('--dry-run', 'Evaluate without writing state or sending notifications', false)
    .option('--critical', 'Only check critical alerts', false)
    .option('--summary', 'Show current breaches grouped by severity', false)
    .option('--test-telegram', 'Send a test message to Telegram', false)
    .action(async (options: { dryRun: boolean; critical: boolean; summary: boolean; testTelegram: boolean }) => {
      await runOnce(rt => runCheckAlertsCommand(rt, options, print));
    });

  program
    .command('export')
    .description('Write dashboard data to a JSON file')
    .option('--days <n>', 'Days of chart history', positiveInt, 365)
    .option('--out <file>', 'Output file', DEFAULT_EXPORT_FILE)
    .action(async (options: { days: number; out: string }) => {
      await runOnce(rt => runExportCommand(rt, options, print));
    });

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--with-scheduler', 'Run scheduled jobs in the same process', false)
    .action(async (options: { withScheduler: boolean }) => {
      await startServer({ withScheduler: options.withScheduler });
    });

  program
    .command('schedule')
    .description('Run the job scheduler')
    .action(async () => {
      await runScheduler();
    });

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});

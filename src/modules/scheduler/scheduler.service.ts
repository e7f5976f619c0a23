/**
 * SCHEDULER SERVICE
 *
 * Runs the monitor's jobs on node-cron in the configured timezone.
 * A job still running when its next tick fires is skipped, not overlapped.
 * Job errors are logged; the scheduler keeps running.
 */

import cron from 'node-cron';
import { ConfigError, errorMessage } from '../../common/errors.js';
import { noopLogger, type Logger } from '../../common/logger.js';
import type { ScheduleDefinition } from '../../config/monitor.config.js';

export const JOB_NAMES = ['fetchDaily', 'fetchWeekly', 'checkAlerts', 'dailySummary'] as const;
export type JobName = (typeof JOB_NAMES)[number];

export type JobHandlers = Record<JobName, () => Promise<unknown>>;

export interface JobResult {
  ok: boolean;
  jobName: JobName;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
  skipped?: boolean;
  skipReason?: 'ALREADY_RUNNING';
  error?: string;
}

export interface CronTask {
  stop: () => unknown;
}

export interface CronApi {
  schedule(expression: string, fn: () => void | Promise<void>, options?: { timezone?: string }): CronTask;
  validate(expression: string): boolean;
}

export interface SchedulerServiceDeps {
  schedule: ScheduleDefinition;
  timezone: string;
  jobs: JobHandlers;
  logger?: Logger;
  cron?: CronApi;
}

export class SchedulerService {
  private readonly logger: Logger;
  private readonly cron: CronApi;
  private readonly running = new Set<JobName>();
  private tasks: CronTask[] = [];

  constructor(private readonly deps: SchedulerServiceDeps) {
    this.logger = deps.logger ?? noopLogger;
    this.cron = deps.cron ?? cron;
  }

  /**
   * Registers every job that has a cron expression. Returns the job names.
   * Throws ConfigError on an invalid expression before anything is scheduled.
   */
  start(): JobName[] {
    const planned: Array<{ name: JobName; expression: string }> = [];
    for (const name of JOB_NAMES) {
      const entry = this.deps.schedule[name];
      if (!entry) continue;
      if (!this.cron.validate(entry.cron)) {
        throw new ConfigError(`Invalid cron expression for ${name}: "${entry.cron}"`);
      }
      planned.push({ name, expression: entry.cron });
    }

    for (const { name, expression } of planned) {
      const task = this.cron.schedule(
        expression,
        async () => {
          await this.runJob(name);
        },
        { timezone: this.deps.timezone }
      );
      this.tasks.push(task);
      this.logger.info({ job: name, cron: expression, timezone: this.deps.timezone }, '[Scheduler] Job scheduled');
    }

    return planned.map(p => p.name);
  }

  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    this.logger.info({}, '[Scheduler] Stopped');
  }

  isRunning(name: JobName): boolean {
    return this.running.has(name);
  }

  async runJob(name: JobName): Promise<JobResult> {
    const startedAt = new Date();

    if (this.running.has(name)) {
      this.logger.warn({ job: name }, '[Scheduler] Previous run still in progress, skipping');
      return { ok: false, jobName: name, startedAt: startedAt.toISOString(), skipped: true, skipReason: 'ALREADY_RUNNING' };
    }

    this.running.add(name);
    this.logger.info({ job: name }, '[Scheduler] Job starting');

    try {
      await this.deps.jobs[name]();
      const completedAt = new Date();
      const durationMs = completedAt.getTime() - startedAt.getTime();
      this.logger.info({ job: name, durationMs }, '[Scheduler] Job completed');
      return {
        ok: true,
        jobName: name,
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs,
      };
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error({ job: name, error }, '[Scheduler] Job failed');
      return { ok: false, jobName: name, startedAt: startedAt.toISOString(), error };
    } finally {
      this.running.delete(name);
    }
  }
}

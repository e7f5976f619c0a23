/**
 * MONITOR CONFIG
 *
 * Declarative document describing what to fetch, what to derive, which
 * statistics to compute, which rules to alert on, and how the dashboard and
 * notifications behave. Loaded once per process and passed by reference.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

const RESERVED_NAMES = new Set(['abs', 'min', 'max', 'and', 'or', 'not', 'True', 'False', 'true', 'false', 'value']);

const IdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain identifier (letters, digits, underscore)');

export const SeveritySchema = z.enum(['info', 'warning', 'critical']);
export type Severity = z.infer<typeof SeveritySchema>;
export const SEVERITIES: readonly Severity[] = ['critical', 'warning', 'info'];

const SeriesSchema = z.object({
  key: IdentifierSchema,
  seriesId: z.string().min(1),
  label: z.string().min(1),
  unit: z.string().default(''),
  // Publication cadence, reported by /api/series. Alignment forward-fills every series alike.
  frequency: z.enum(['daily', 'weekly', 'monthly']).default('daily'),
  category: z.string().optional(),
  description: z.string().optional(),
});

const DerivedSchema = z.object({
  key: IdentifierSchema,
  expr: z.string().min(1),
  label: z.string().min(1),
  unit: z.string().default(''),
  category: z.string().optional(),
  description: z.string().optional(),
});

const ChangeSchema = z.object({
  name: IdentifierSchema,
  type: z.enum(['diff', 'pct_change']),
  periods: z.number().int().positive(),
});

const RollingSchema = z.object({
  name: IdentifierSchema,
  type: z.enum(['rolling_mean', 'rolling_std', 'zscore']),
  window: z.number().int().positive(),
});

const AlertSchema = z.object({
  key: IdentifierSchema,
  rule: z.string().min(1),
  severity: SeveritySchema,
  category: z.string().default(''),
  note: z.string().default(''),
});

const ChartSchema = z.object({
  title: z.string().min(1),
  series: z.array(z.string()).min(1),
  chartType: z.enum(['line', 'bar', 'area']).default('line'),
  yAxisLabel: z.string().default(''),
  height: z.number().int().positive().default(400),
  referenceLine: z.number().optional(),
});

const TableSchema = z.object({
  title: z.string().min(1),
  series: z.array(z.string()).min(1),
  showColumns: z.array(z.string()).default(['value', 'd1', 'd5']),
});

const KeyMetricSchema = z.object({
  key: z.string().min(1),
  label: z.string().optional(),
  category: z.string().default(''),
});

const CronSchema = z.object({ cron: z.string().min(1) });

const MonitorConfigSchema = z
  .object({
    version: z.string().default('unknown'),
    timezone: z.string().default('UTC'),
    dataSources: z
      .object({
        fred: z
          .object({
            baseUrl: z.string().url().default('https://api.stlouisfed.org/fred'),
            apiKeyEnv: z.string().default('FRED_API_KEY'),
            timeoutMs: z.number().int().positive().default(30000),
            rateLimit: z
              .object({
                requestsPerMinute: z.number().int().positive().default(100),
                retryDelaySeconds: z.number().nonnegative().default(5),
                maxRetries: z.number().int().nonnegative().default(2),
              })
              .default({}),
          })
          .default({}),
      })
      .default({}),
    series: z.array(SeriesSchema).default([]),
    derived: z.array(DerivedSchema).default([]),
    metrics: z
      .object({
        changes: z.array(ChangeSchema).default([]),
        rolling: z.array(RollingSchema).default([]),
      })
      .default({}),
    alerts: z.array(AlertSchema).default([]),
    alerting: z
      .object({
        severities: z.array(SeveritySchema).min(1).default(['critical']),
      })
      .default({}),
    panel: z
      .object({
        refreshIntervalSeconds: z.number().int().positive().default(300),
        keyMetrics: z.array(KeyMetricSchema).default([]),
        charts: z.array(ChartSchema).default([]),
        tables: z.array(TableSchema).default([]),
      })
      .default({}),
    notifications: z
      .object({
        telegram: z
          .object({
            enabled: z.boolean().default(false),
            botTokenEnv: z.string().default('TELEGRAM_BOT_TOKEN'),
            chatIdEnv: z.string().default('TELEGRAM_CHAT_ID'),
            parseMode: z.enum(['Markdown', 'plain']).default('Markdown'),
            timeoutMs: z.number().int().positive().default(10000),
          })
          .default({}),
      })
      .default({}),
    schedule: z
      .object({
        fetchDaily: CronSchema.optional(),
        fetchWeekly: CronSchema.optional(),
        checkAlerts: CronSchema.optional(),
        dailySummary: CronSchema.optional(),
      })
      .default({}),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    for (const def of [...doc.series, ...doc.derived]) {
      if (seen.has(def.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate metric key "${def.key}"` });
      }
      if (RESERVED_NAMES.has(def.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `metric key "${def.key}" is reserved` });
      }
      seen.add(def.key);
    }

    const suffixes = new Set<string>();
    for (const def of [...doc.metrics.changes, ...doc.metrics.rolling]) {
      if (suffixes.has(def.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate metric statistic "${def.name}"` });
      }
      if (RESERVED_NAMES.has(def.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `metric statistic "${def.name}" is reserved` });
      }
      suffixes.add(def.name);
    }
  });

export type MonitorConfigDocument = z.infer<typeof MonitorConfigSchema>;
export type SeriesDefinition = z.infer<typeof SeriesSchema>;
export type DerivedDefinition = z.infer<typeof DerivedSchema>;
export type ChangeDefinition = z.infer<typeof ChangeSchema>;
export type RollingDefinition = z.infer<typeof RollingSchema>;
export type AlertDefinition = z.infer<typeof AlertSchema>;
export type ScheduleDefinition = MonitorConfigDocument['schedule'];
export type FredSourceConfig = MonitorConfigDocument['dataSources']['fred'];
export type TelegramConfig = MonitorConfigDocument['notifications']['telegram'];

export interface MetricDescription {
  key: string;
  label: string;
  unit: string;
}

// ═══════════════════════════════════════════════════════════════
// CONFIG OBJECT
// ═══════════════════════════════════════════════════════════════

export class MonitorConfig {
  private readonly seriesByKey: Map<string, SeriesDefinition>;
  private readonly derivedByKey: Map<string, DerivedDefinition>;

  constructor(readonly doc: MonitorConfigDocument) {
    this.seriesByKey = new Map(doc.series.map(s => [s.key, s]));
    this.derivedByKey = new Map(doc.derived.map(d => [d.key, d]));
  }

  get version(): string {
    return this.doc.version;
  }

  get timezone(): string {
    return this.doc.timezone;
  }

  get fred(): FredSourceConfig {
    return this.doc.dataSources.fred;
  }

  get series(): readonly SeriesDefinition[] {
    return this.doc.series;
  }

  get seriesKeys(): string[] {
    return [...this.seriesByKey.keys()];
  }

  get derived(): readonly DerivedDefinition[] {
    return this.doc.derived;
  }

  get derivedKeys(): string[] {
    return [...this.derivedByKey.keys()];
  }

  get metricChanges(): readonly ChangeDefinition[] {
    return this.doc.metrics.changes;
  }

  get metricRolling(): readonly RollingDefinition[] {
    return this.doc.metrics.rolling;
  }

  /**
   * Names of every configured change and rolling statistic, in config order.
   */
  get metricSuffixes(): string[] {
    return [...this.doc.metrics.changes.map(c => c.name), ...this.doc.metrics.rolling.map(r => r.name)];
  }

  get alerts(): readonly AlertDefinition[] {
    return this.doc.alerts;
  }

  get alertingSeverities(): readonly Severity[] {
    return this.doc.alerting.severities;
  }

  get panel(): MonitorConfigDocument['panel'] {
    return this.doc.panel;
  }

  get telegram(): TelegramConfig {
    return this.doc.notifications.telegram;
  }

  get schedule(): ScheduleDefinition {
    return this.doc.schedule;
  }

  getSeries(key: string): SeriesDefinition | undefined {
    return this.seriesByKey.get(key);
  }

  getDerived(key: string): DerivedDefinition | undefined {
    return this.derivedByKey.get(key);
  }

  /**
   * Label and unit for a raw or derived key; falls back to the key itself.
   */
  describe(key: string): MetricDescription {
    const def = this.seriesByKey.get(key) ?? this.derivedByKey.get(key);
    return { key, label: def?.label ?? key, unit: def?.unit ?? '' };
  }
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

export function parseMonitorConfig(raw: unknown): MonitorConfig {
  const parsed = MonitorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new ConfigError(`Invalid monitor configuration: ${issues.join('; ')}`, issues);
  }
  return new MonitorConfig(parsed.data);
}

export function loadMonitorConfig(configPath: string): MonitorConfig {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read monitor configuration at ${resolved}`, [String(err)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Monitor configuration at ${resolved} is not valid JSON`, [String(err)]);
  }

  return parseMonitorConfig(raw);
}

/**
 * Reads a secret from the environment variable the config names.
 * Returns an empty string when unset.
 */
export function resolveSecret(envName: string, env: NodeJS.ProcessEnv = process.env): string {
  return env[envName]?.trim() ?? '';
}

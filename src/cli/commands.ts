/**
 * CLI command bodies.
 *
 * Each takes a built runtime and a line printer and returns the process exit
 * code, so they run the same under commander and under tests.
 */

import { SEVERITIES, type Severity } from '../config/monitor.config.js';
import type { AlertEvaluation } from '../modules/alerts/contracts/alert.types.js';
import type { FetchRunResult } from '../modules/series/contracts/series.contracts.js';
import type { Runtime } from '../runtime.js';

export type Print = (line: string) => void;

export interface FetchCommandOptions {
  backfill?: boolean;
  years?: number;
  days?: number;
  check?: boolean;
}

export interface CheckAlertsCommandOptions {
  dryRun?: boolean;
  critical?: boolean;
  summary?: boolean;
  testTelegram?: boolean;
}

export interface ExportCommandOptions {
  days?: number;
  out?: string;
}

export const DEFAULT_EXPORT_FILE = 'static/data.json';

function formatNumber(value: number | null, digits: number): string {
  return value === null ? 'N/A' : value.toFixed(digits);
}

// ═══════════════════════════════════════════════════════════════
// fetch
// ═══════════════════════════════════════════════════════════════

/**
 * Exit 1 when the health check fails, the API key is missing, or every
 * series failed. Partial failures are reported and exit 0.
 */
export async function runFetchCommand(rt: Runtime, options: FetchCommandOptions, print: Print): Promise<number> {
  if (options.check) {
    const health = await rt.ingest.checkFredHealth();
    print(`FRED: ${health.ok ? 'OK' : 'FAILED'} - ${health.message}`);
    return health.ok ? 0 : 1;
  }

  if (!rt.fred.hasApiKey()) {
    print(`FRED API key not configured (set ${rt.config.fred.apiKeyEnv})`);
    return 1;
  }

  let result: FetchRunResult;
  if (options.backfill) {
    const years = options.years ?? 2;
    print(`Backfilling ${years} years of data...`);
    result = await rt.ingest.backfillAll(years);
  } else if (options.days) {
    print(`Fetching last ${options.days} days of data...`);
    result = await rt.ingest.fetchAllSeries({ backfillDays: options.days });
  } else {
    print('Fetching new data since last fetch...');
    result = await rt.ingest.fetchAllSeries();
  }

  for (const item of result.results) {
    const status = item.ok ? `${item.rowsFetched} rows` : `FAILED: ${item.error ?? 'unknown error'}`;
    print(`  ${item.seriesKey} (${item.seriesId}): ${status}`);
  }
  print(`Series: ${result.successCount}/${result.totalSeries} ok`);
  print(`Stored ${result.derivedStored} derived metric values.`);

  return result.totalSeries > 0 && result.successCount === 0 ? 1 : 0;
}

// ═══════════════════════════════════════════════════════════════
// check-alerts
// ═══════════════════════════════════════════════════════════════

function printBreach(print: Print, evaluation: AlertEvaluation): void {
  print(`[${evaluation.severity.toUpperCase()}] ${evaluation.key}`);
  print(`  Value: ${formatNumber(evaluation.value, 4)}`);
  print(`  Rule: ${evaluation.rule}`);
  if (evaluation.note) print(`  Note: ${evaluation.note}`);
}

/**
 * Exit 1 when the Telegram test fails or any alert could not be processed.
 */
export async function runCheckAlertsCommand(
  rt: Runtime,
  options: CheckAlertsCommandOptions,
  print: Print
): Promise<number> {
  if (options.testTelegram) {
    const result = await rt.notifier.testConnection();
    print(result.ok ? 'Telegram test message sent.' : `Telegram test failed: ${result.error ?? 'unknown error'}`);
    return result.ok ? 0 : 1;
  }

  if (options.summary) {
    const summary = await rt.monitor.getBreachSummary();
    print('=== Current Breach Summary ===');
    for (const severity of SEVERITIES) {
      const breaches = summary[severity];
      print(`${severity.toUpperCase()} (${breaches.length}):`);
      for (const b of breaches) {
        print(`  - ${b.key}: ${formatNumber(b.value, 2)}`);
        print(`    Rule: ${b.rule}`);
        if (b.note) print(`    ${b.note}`);
      }
    }
    return 0;
  }

  const severities: readonly Severity[] = options.critical ? ['critical'] : rt.config.alertingSeverities;
  const report = await rt.monitor.runCycle({ severities, dryRun: options.dryRun ?? false });

  const breached = report.items.filter(i => i.evaluation.classification === 'BREACH');
  print(`Alerts evaluated: ${report.evaluated} (${severities.join(', ')})`);
  print(`Breached: ${breached.length}, unknown: ${report.unknown}`);

  for (const item of breached) printBreach(print, item.evaluation);

  for (const item of report.items) {
    if (item.evaluation.classification === 'UNKNOWN') {
      print(`[UNKNOWN] ${item.evaluation.key}: ${item.evaluation.reason ?? 'not evaluated'}`);
    }
  }

  if (report.dryRun) {
    print(`Dry run: ${report.transitions} transition(s) would be recorded, nothing written or sent.`);
  } else if (report.newBreaches.length === 0) {
    print(`Transitions: ${report.transitions}. No new breaches, no notifications sent.`);
  } else {
    print(
      `Transitions: ${report.transitions}. New breaches: ${report.newBreaches.length}, ` +
        `notifications sent: ${report.notificationsSent}, failed: ${report.notificationsFailed}.`
    );
  }

  for (const { alertId, error } of report.errors) print(`ERROR ${alertId}: ${error}`);
  return report.errors.length > 0 ? 1 : 0;
}

// ═══════════════════════════════════════════════════════════════
// export
// ═══════════════════════════════════════════════════════════════

export async function runExportCommand(rt: Runtime, options: ExportCommandOptions, print: Print): Promise<number> {
  const file = await rt.dashboard.exportToFile(options.out ?? DEFAULT_EXPORT_FILE, { days: options.days ?? 365 });
  print(`Exported to ${file}`);
  return 0;
}

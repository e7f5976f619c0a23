/**
 * MESSAGE BUILDER
 *
 * Telegram (legacy Markdown) text for alerts and daily summaries.
 */

import type { Severity } from '../../../config/monitor.config.js';
import type { AlertEvaluation } from '../../alerts/contracts/alert.types.js';
import type { LatestValues } from '../../metrics/contracts/metrics.contracts.js';
import type { SignificantChange } from '../contracts/notify.types.js';
import { escapeMarkdown } from './telegram.transport.js';

const SEVERITY_EMOJI: Record<Severity, string> = {
  critical: '🚨',
  warning: '⚠️',
  info: 'ℹ️',
};

/**
 * Minimum |1-day change| worth reporting, per unit. Units not listed are
 * never reported.
 */
export const SIGNIFICANCE_THRESHOLDS: Readonly<Record<string, number>> = {
  percent: 2,
  bps: 2,
  usd_billions: 10,
  usd_millions: 10000,
  ratio: 0.01,
};

export interface MessageContext {
  timezone: string;
  now: Date;
}

// ═══════════════════════════════════════════════════════════════
// NUMBERS & TIME
// ═══════════════════════════════════════════════════════════════

function isRateUnit(unit: string): boolean {
  return unit === 'percent' || unit === 'bps';
}

function grouped(value: number, digits: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: digits, maximumFractionDigits: digits });
}

function signed(value: number, text: string): string {
  return `${value > 0 ? '+' : ''}${text}`;
}

export function formatValue(value: number | null, unit: string): string {
  if (value === null) return 'N/A';
  if (isRateUnit(unit)) return value.toFixed(2);
  if (unit === 'usd_millions') return `$${grouped(value, 0)}M`;
  if (unit === 'usd_billions') return `$${grouped(value, 1)}B`;
  return grouped(value, 2);
}

export function formatChange(change: number, unit: string): string {
  return signed(change, isRateUnit(unit) ? change.toFixed(2) : grouped(change, 0));
}

/**
 * "YYYY-MM-DD HH:mm" in the given IANA zone (UTC when the zone is unknown).
 */
export function formatTimestamp(date: Date, timezone: string): string {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
  } catch {
    return formatTimestamp(date, 'UTC');
  }

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) parts[part.type] = part.value;
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}`;
}

// ═══════════════════════════════════════════════════════════════
// MESSAGES
// ═══════════════════════════════════════════════════════════════

export function formatAlertMessage(evaluation: AlertEvaluation, ctx: MessageContext): string {
  const { severity, unit, context } = evaluation;

  const lines = [
    `${SEVERITY_EMOJI[severity]} *${severity.toUpperCase()}*: ${escapeMarkdown(evaluation.label)}`,
    '',
    `*Current:* ${formatValue(evaluation.value, unit)}`,
  ];

  const d1 = context.d1;
  if (typeof d1 === 'number') lines.push(`*1D Change:* ${formatChange(d1, unit)}`);
  const d5 = context.d5;
  if (typeof d5 === 'number') lines.push(`*5D Change:* ${formatChange(d5, unit)}`);

  if (evaluation.note) {
    lines.push('', `_${escapeMarkdown(evaluation.note)}_`);
  }

  lines.push('', `\`${formatTimestamp(ctx.now, ctx.timezone)} ${ctx.timezone}\``);
  return lines.join('\n');
}

function formatSummaryLine(change: SignificantChange): string {
  const { label, unit, value, d1 } = change;
  const name = escapeMarkdown(label);

  if (isRateUnit(unit)) return `• ${name}: ${value.toFixed(2)} (${signed(d1, d1.toFixed(2))})`;
  if (unit === 'usd_millions') return `• ${name}: $${grouped(value, 0)}M (${signed(d1, grouped(d1, 0))})`;
  if (unit === 'usd_billions') return `• ${name}: $${grouped(value, 1)}B (${signed(d1, d1.toFixed(1))})`;
  return `• ${name}: ${grouped(value, 2)} (${signed(d1, grouped(d1, 2))})`;
}

/** Summary of non-empty `changes`; the notifier sends nothing when there are none. */
export function formatDailySummary(changes: SignificantChange[], ctx: MessageContext): string {
  const date = formatTimestamp(ctx.now, ctx.timezone).slice(0, 10);
  return [
    '📊 *Fed Monitor Daily Summary*',
    `*Date:* ${date}`,
    '',
    '*Significant Changes:*',
    ...changes.map(formatSummaryLine),
    '',
    `\`${ctx.timezone}\``,
  ].join('\n');
}

export function formatTestMessage(): string {
  return '✅ *Fed Monitor* - Telegram connection test successful!';
}

/**
 * Metrics whose latest 1-day change exceeds the threshold for their unit.
 */
export function findSignificantChanges(latest: LatestValues): SignificantChange[] {
  const changes: SignificantChange[] = [];

  for (const metric of Object.values(latest)) {
    const d1 = metric.stats.d1;
    const threshold = Object.hasOwn(SIGNIFICANCE_THRESHOLDS, metric.unit)
      ? SIGNIFICANCE_THRESHOLDS[metric.unit]
      : undefined;
    if (d1 === undefined || threshold === undefined) continue;

    if (Math.abs(d1) > threshold) {
      changes.push({ key: metric.key, label: metric.label, unit: metric.unit, value: metric.value, d1 });
    }
  }

  return changes;
}

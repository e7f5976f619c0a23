/**
 * ALERT IDENTITY
 *
 * alertId = "<key>:<severity>:<hash(rule) mod 10000>", where hash is the first
 * 32 bits of SHA-256 over the UTF-8 rule text, big-endian. Same definition,
 * same id, across processes and releases.
 */

import { createHash } from 'crypto';
import type { AlertDefinition } from '../../../config/monitor.config.js';

export function stableRuleHash(rule: string): number {
  return createHash('sha256').update(rule, 'utf8').digest().readUInt32BE(0);
}

export function makeAlertId(def: Pick<AlertDefinition, 'key' | 'severity' | 'rule'>): string {
  return `${def.key}:${def.severity}:${stableRuleHash(def.rule) % 10000}`;
}

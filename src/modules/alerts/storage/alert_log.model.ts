/**
 * ALERT LOG MODEL
 *
 * Append-only record of state transitions.
 */

import mongoose, { Schema } from 'mongoose';
import type { AlertTransitionLogEntry } from '../contracts/alert.types.js';

const AlertLogSchema = new Schema<AlertTransitionLogEntry>(
  {
    logId: { type: String, required: true, unique: true },
    alertId: { type: String, required: true, index: true },
    key: { type: String, required: true },
    severity: { type: String, required: true, enum: ['info', 'warning', 'critical'] },
    stateFrom: { type: String, required: true, enum: ['OK', 'BREACH'] },
    stateTo: { type: String, required: true, enum: ['OK', 'BREACH'] },
    value: { type: Number, default: null },
    note: { type: String, default: '' },
    notification: { type: String, required: true, enum: ['SENT', 'FAILED', 'SKIPPED', 'NONE'] },
    triggeredAt: { type: Date, required: true },
  },
  {
    collection: 'alert_log',
  }
);

AlertLogSchema.index({ triggeredAt: -1 });

export const AlertLogModel = mongoose.model<AlertTransitionLogEntry>('AlertLog', AlertLogSchema);

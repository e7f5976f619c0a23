/**
 * ALERT STATE MODEL
 *
 * One row per alertId: last classification and when it last changed.
 */

import mongoose, { Schema } from 'mongoose';
import type { AlertStateRecord } from '../contracts/alert.types.js';

const AlertStateSchema = new Schema<AlertStateRecord>(
  {
    alertId: { type: String, required: true, unique: true },
    key: { type: String, required: true, index: true },
    severity: { type: String, required: true, enum: ['info', 'warning', 'critical'] },
    state: { type: String, required: true, enum: ['OK', 'BREACH'] },
    lastValue: { type: Number, default: null },
    lastTransitionTime: { type: Date, default: null },
    lastEvaluatedAt: { type: Date, required: true },
  },
  {
    collection: 'alert_state',
  }
);

AlertStateSchema.index({ state: 1 });

export const AlertStateModel = mongoose.model<AlertStateRecord>('AlertState', AlertStateSchema);

/**
 * FETCH LOG MODEL
 *
 * Append-only record of every series fetch attempt.
 */

import mongoose, { Schema } from 'mongoose';
import type { FetchLogEntry } from '../contracts/series.contracts.js';

const FetchLogSchema = new Schema<FetchLogEntry>(
  {
    seriesKey: { type: String, required: true, index: true },
    status: { type: String, enum: ['success', 'error'], required: true },
    rowsFetched: { type: Number, required: true, default: 0 },
    errorMessage: { type: String },
    fetchedAt: { type: Date, required: true, default: () => new Date() },
  },
  {
    collection: 'fetch_log',
  }
);

FetchLogSchema.index({ fetchedAt: -1 });

export const FetchLogModel = mongoose.model<FetchLogEntry>('FetchLog', FetchLogSchema);

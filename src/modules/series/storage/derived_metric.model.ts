/**
 * DERIVED METRIC MODEL
 *
 * Recomputable cache of derived-metric values.
 */

import mongoose, { Schema } from 'mongoose';

export interface IDerivedMetric {
  metricKey: string;
  date: string;
  value: number;
  computedAt: Date;
}

const DerivedMetricSchema = new Schema<IDerivedMetric>(
  {
    metricKey: { type: String, required: true, index: true },
    date: { type: String, required: true },
    value: { type: Number, required: true },
    computedAt: { type: Date, required: true, default: () => new Date() },
  },
  {
    collection: 'derived_metrics',
  }
);

DerivedMetricSchema.index({ metricKey: 1, date: 1 }, { unique: true });

export const DerivedMetricModel = mongoose.model<IDerivedMetric>('DerivedMetric', DerivedMetricSchema);

/**
 * OBSERVATION MODEL
 *
 * One FRED observation per series key per date.
 */

import mongoose, { Schema } from 'mongoose';

export interface IObservation {
  seriesKey: string;
  date: string;         // ISO date (YYYY-MM-DD)
  value: number;
  source: string;
  createdAt: Date;
  updatedAt: Date;
}

const ObservationSchema = new Schema<IObservation>(
  {
    seriesKey: { type: String, required: true, index: true },
    date: { type: String, required: true },
    value: { type: Number, required: true },
    source: { type: String, required: true, default: 'FRED' },
  },
  {
    timestamps: true,
    collection: 'observations',
  }
);

// Re-fetch overwrites in place
ObservationSchema.index({ seriesKey: 1, date: 1 }, { unique: true });
ObservationSchema.index({ date: -1 });

export const ObservationModel = mongoose.model<IObservation>('Observation', ObservationSchema);

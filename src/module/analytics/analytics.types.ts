// src/module/analytics/analytics.types.ts
import { AlertType } from '../readings/enums/alert.enum';

export interface AlertSummaryRow {
  alertType: AlertType;
  count: number;
  criticalCount: number;
  warningCount: number;
}

export interface TrendBucket {
  /** UTC start of the hour */
  bucket: Date;
  year: number;
  month: number;
  day: number;
  hour: number;
  avg: number;
  min: number;
  max: number;
  count: number;
}

/** `null` when no document in the window carried the metric. */
export interface MetricStats {
  avg: number | null;
  min: number | null;
  max: number | null;
}

export interface AggregatedMetrics {
  temperature: MetricStats;
  humidity: MetricStats;
  totalReadings: number;
  alertCount: number;
}

export interface DataQuality {
  periodDays: number;
  expectedReadings: number;
  actualReadings: number;
  missingReadings: number;
  missingPercentage: number;
  anomalyCount: number;
  completenessPercentage: number;
}

export interface CollectionStats {
  firstRecord: Date;
  lastRecord: Date;
  totalDocuments: number;
}

/** Fixed reporting band for "ideal" stretches; independent of live thresholds. */
export const OPTIMAL_BAND = {
  temperature: { min: 63, max: 80 },
  humidity: { min: 40, max: 60 },
} as const;

/** Wider sanity band; readings outside it count as anomalies. */
export const SANITY_BAND = {
  temperature: { min: 60, max: 85 },
  humidity: { min: 35, max: 70 },
} as const;

/** One reading per minute. */
export const EXPECTED_READINGS_PER_DAY = 24 * 60;

// src/module/analytics/analytics.service.ts
import { Inject, Injectable } from '@nestjs/common';
import type { AccumulatorOperator, PipelineStage } from 'mongoose';
import { LoggerService } from '../../common/logger/logger.service';
import { Severity } from '../readings/enums/alert.enum';
import { READINGS_STORE, ReadingsStore } from '../readings/readings.store';
import { PersistedReading } from '../readings/readings.schema';
import { fromPersisted } from '../readings/readings.mapper';
import { metadataMatch } from '../readings/readings.filters';
import { MetadataFilter, Metric, StoredReading } from '../readings/readings.types';
import { QueryWindow } from './query-window';
import {
  AggregatedMetrics,
  AlertSummaryRow,
  CollectionStats,
  DataQuality,
  EXPECTED_READINGS_PER_DAY,
  MetricStats,
  OPTIMAL_BAND,
  SANITY_BAND,
  TrendBucket,
} from './analytics.types';

const round2 = (n: number) => Math.round(n * 100) / 100;

const newestFirst: PipelineStage.Sort = { $sort: { timestamp: -1 } };
const oldestFirst: PipelineStage.Sort = { $sort: { timestamp: 1 } };

interface TrendRow {
  year: number;
  month: number;
  day: number;
  hour: number;
  avg: number;
  min: number;
  max: number;
  count: number;
}

interface AggregatedRow {
  avgTemperature: number | null;
  minTemperature: number | null;
  maxTemperature: number | null;
  avgHumidity: number | null;
  minHumidity: number | null;
  maxHumidity: number | null;
  totalReadings: number;
  alertCount: number;
}

interface QualityRow {
  actual: { n: number }[];
  anomalies: { n: number }[];
}

/**
 * Read-only reporting over the readings collection. Every operation
 * takes a QueryWindow; failures are logged and reported as an empty
 * list or `null`, never as a partial result.
 */
@Injectable()
export class AnalyticsService {
  constructor(
    @Inject(READINGS_STORE) private readonly store: ReadingsStore,
    private readonly logger: LoggerService,
  ) {}

  /** Readings in the window, newest first. */
  recent(window: QueryWindow, limit?: number): Promise<StoredReading[]> {
    const pipeline: PipelineStage[] = [window.matchStage(), newestFirst];
    if (limit !== undefined) pipeline.push({ $limit: limit });

    return this.safely('recent readings', [], async () => {
      const rows = await this.readings(pipeline);
      this.logger.log(`✅ Retrieved ${rows.length} documents for ${window.describe()}`, AnalyticsService.name);
      return rows;
    });
  }

  /** Alert counts per type, with the severity split inside each type. */
  alertSummary(window: QueryWindow): Promise<AlertSummaryRow[]> {
    const severityIs = (severity: Severity): AccumulatorOperator => ({
      $sum: { $cond: [{ $eq: [{ $arrayElemAt: ['$alert', 1] }, severity] }, 1, 0] },
    });

    const pipeline: PipelineStage[] = [
      window.matchStage({ 'alert_type.0': { $exists: true } }),
      { $project: { _id: 0, alert: { $zip: { inputs: ['$alert_type', '$severity'] } } } },
      { $unwind: '$alert' },
      {
        $group: {
          _id: { $arrayElemAt: ['$alert', 0] },
          count: { $sum: 1 },
          criticalCount: severityIs(Severity.CRITICAL),
          warningCount: severityIs(Severity.WARNING),
        },
      },
      { $sort: { _id: 1 } },
      { $project: { _id: 0, alertType: '$_id', count: 1, criticalCount: 1, warningCount: 1 } },
    ];

    return this.safely('alert summary', [], async () => {
      const rows = await this.store.runAggregation<AlertSummaryRow>(pipeline);
      this.logger.log(`✅ Alert summary retrieved for ${window.describe()}`, AnalyticsService.name);
      return rows;
    });
  }

  /** Hourly UTC buckets over documents that carry the metric, oldest first. */
  trend(metric: Metric, window: QueryWindow): Promise<TrendBucket[]> {
    const field = `metrics.${metric}`;
    const pipeline: PipelineStage[] = [
      window.matchStage({ [field]: { $type: 'number' } }),
      {
        $group: {
          _id: {
            year: { $year: '$timestamp' },
            month: { $month: '$timestamp' },
            day: { $dayOfMonth: '$timestamp' },
            hour: { $hour: '$timestamp' },
          },
          avg: { $avg: `$${field}` },
          min: { $min: `$${field}` },
          max: { $max: `$${field}` },
          count: { $sum: 1 },
        },
      },
      { $sort: { '_id.year': 1, '_id.month': 1, '_id.day': 1, '_id.hour': 1 } },
      {
        $project: {
          _id: 0,
          year: '$_id.year',
          month: '$_id.month',
          day: '$_id.day',
          hour: '$_id.hour',
          avg: 1,
          min: 1,
          max: 1,
          count: 1,
        },
      },
    ];

    return this.safely(`${metric} trend`, [], async () => {
      const rows = await this.store.runAggregation<TrendRow>(pipeline);
      this.logger.log(`✅ ${metric} trends retrieved: ${rows.length} hourly buckets`, AnalyticsService.name);
      return rows.map((row) => ({
        bucket: new Date(Date.UTC(row.year, row.month - 1, row.day, row.hour)),
        ...row,
      }));
    });
  }

  /** Alert-free readings inside the fixed optimal band, newest first. */
  optimalPeriods(window: QueryWindow): Promise<StoredReading[]> {
    const { temperature, humidity } = OPTIMAL_BAND;
    const pipeline: PipelineStage[] = [
      window.matchStage({
        alert_type: { $in: [null, []] },
        'metrics.temperature': { $gte: temperature.min, $lte: temperature.max },
        'metrics.humidity': { $gte: humidity.min, $lte: humidity.max },
      }),
      newestFirst,
    ];

    return this.safely('optimal periods', [], async () => {
      const rows = await this.readings(pipeline);
      this.logger.log(`✅ Retrieved ${rows.length} optimal condition records`, AnalyticsService.name);
      return rows;
    });
  }

  /** Single summary document, or `null` when nothing matched. */
  aggregatedMetrics(window: QueryWindow): Promise<AggregatedMetrics | null> {
    const pipeline: PipelineStage[] = [
      window.matchStage(),
      {
        $group: {
          _id: null,
          avgTemperature: { $avg: '$metrics.temperature' },
          minTemperature: { $min: '$metrics.temperature' },
          maxTemperature: { $max: '$metrics.temperature' },
          avgHumidity: { $avg: '$metrics.humidity' },
          minHumidity: { $min: '$metrics.humidity' },
          maxHumidity: { $max: '$metrics.humidity' },
          totalReadings: { $sum: 1 },
          alertCount: {
            $sum: {
              $cond: [{ $gt: [{ $size: { $ifNull: ['$alert_type', []] } }, 0] }, 1, 0],
            },
          },
        },
      },
    ];

    return this.safely('aggregated metrics', null, async () => {
      const [row] = await this.store.runAggregation<AggregatedRow>(pipeline);
      if (!row || row.totalReadings === 0) {
        this.logger.warn(`⚠️ No data found for aggregation (${window.describe()})`, AnalyticsService.name);
        return null;
      }

      const stats = (avg: number | null, min: number | null, max: number | null): MetricStats => ({
        avg: avg ?? null,
        min: min ?? null,
        max: max ?? null,
      });

      this.logger.log('✅ Aggregated metrics calculated', AnalyticsService.name);
      return {
        temperature: stats(row.avgTemperature, row.minTemperature, row.maxTemperature),
        humidity: stats(row.avgHumidity, row.minHumidity, row.maxHumidity),
        totalReadings: row.totalReadings,
        alertCount: row.alertCount,
      };
    });
  }

  /**
   * Completeness estimate against the one-reading-per-minute cadence.
   * The cadence is assumed, not checked per sensor.
   */
  dataQuality(window: QueryWindow): Promise<DataQuality | null> {
    const { temperature, humidity } = SANITY_BAND;
    const pipeline: PipelineStage[] = [
      window.matchStage(),
      {
        $facet: {
          actual: [{ $count: 'n' }],
          anomalies: [
            {
              $match: {
                $or: [
                  { 'metrics.temperature': { $lt: temperature.min } },
                  { 'metrics.temperature': { $gt: temperature.max } },
                  { 'metrics.humidity': { $lt: humidity.min } },
                  { 'metrics.humidity': { $gt: humidity.max } },
                ],
              },
            },
            { $count: 'n' },
          ],
        },
      },
    ];

    return this.safely('data quality', null, async () => {
      const [row] = await this.store.runAggregation<QualityRow>(pipeline);
      const actualReadings = row?.actual[0]?.n ?? 0;
      const anomalyCount = row?.anomalies[0]?.n ?? 0;

      const periodDays = round2(window.durationDays);
      const expectedReadings = Math.max(1, Math.round(window.durationDays * EXPECTED_READINGS_PER_DAY));
      const missingReadings = expectedReadings - actualReadings;

      this.logger.log('✅ Data quality metrics calculated', AnalyticsService.name);
      return {
        periodDays,
        expectedReadings,
        actualReadings,
        missingReadings,
        missingPercentage: round2((missingReadings / expectedReadings) * 100),
        anomalyCount,
        completenessPercentage: round2((actualReadings / expectedReadings) * 100),
      };
    });
  }

  /** First/last timestamps and document count; `null` on an empty collection. */
  collectionStats(): Promise<CollectionStats | null> {
    const pipeline: PipelineStage[] = [
      {
        $group: {
          _id: null,
          firstRecord: { $min: '$timestamp' },
          lastRecord: { $max: '$timestamp' },
          totalDocuments: { $sum: 1 },
        },
      },
      { $project: { _id: 0 } },
    ];

    return this.safely('collection stats', null, async () => {
      const [row] = await this.store.runAggregation<CollectionStats>(pipeline);
      if (!row) {
        this.logger.warn('⚠️ No documents found in collection', AnalyticsService.name);
        return null;
      }
      return row;
    });
  }

  /** Metadata-only search across all time, newest first. */
  searchByMetadata(filters: MetadataFilter, limit = 100): Promise<StoredReading[]> {
    const pipeline: PipelineStage[] = [
      { $match: metadataMatch(filters) },
      newestFirst,
      { $limit: limit },
    ];

    return this.safely('metadata search', [], async () => {
      const rows = await this.readings(pipeline);
      this.logger.log(`✅ Metadata search returned ${rows.length} documents`, AnalyticsService.name);
      return rows;
    });
  }

  /** Readings in the window, oldest first, capped at `limit`. */
  timeRange(window: QueryWindow, limit = 1000): Promise<StoredReading[]> {
    const pipeline: PipelineStage[] = [window.matchStage(), oldestFirst, { $limit: limit }];

    return this.safely('time range', [], async () => {
      const rows = await this.readings(pipeline);
      this.logger.log(`✅ Retrieved ${rows.length} documents for ${window.describe()}`, AnalyticsService.name);
      return rows;
    });
  }

  /**
   * Entire window oldest first, for export. `null` means the read
   * failed, as opposed to an empty window.
   */
  exportRange(window: QueryWindow): Promise<StoredReading[] | null> {
    return this.safely('export read', null, () =>
      this.readings([window.matchStage(), oldestFirst]),
    );
  }

  private async readings(pipeline: PipelineStage[]): Promise<StoredReading[]> {
    const docs = await this.store.runAggregation<PersistedReading>(pipeline);
    return docs.map(fromPersisted);
  }

  private async safely<T>(operation: string, fallback: T, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      this.logger.failure(`❌ Error computing ${operation}`, err, AnalyticsService.name);
      return fallback;
    }
  }
}

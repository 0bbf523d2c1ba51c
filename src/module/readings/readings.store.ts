// src/module/readings/readings.store.ts
import type { PipelineStage } from 'mongoose';
import type { ReadingPredicate, StoredReading } from './readings.types';
import type { TIME_SERIES_OPTIONS } from './readings.schema';

export const READINGS_STORE = 'READINGS_STORE';

export type IndexKey = Record<string, 1 | -1>;

export interface IndexSpec {
  name: string;
  key: Record<string, number | string>;
}

export type TimeSeriesOptions = typeof TIME_SERIES_OPTIONS;

/**
 * The only boundary that talks to the driver. No retries happen here:
 * every failure surfaces as a TelemetryError subclass.
 *  - insert            → WriteError
 *  - reads / deletes   → QueryError
 *  - collection admin  → SchemaSetupError (NamespaceExistsError on a create race)
 */
export interface ReadingsStore {
  readonly collectionName: string;

  insert(reading: StoredReading): Promise<string>;
  findById(id: string): Promise<StoredReading | null>;
  deleteWhere(predicate: ReadingPredicate): Promise<number>;
  runAggregation<T>(pipeline: PipelineStage[]): Promise<T[]>;

  collectionExists(): Promise<boolean>;
  createTimeSeriesCollection(options: TimeSeriesOptions): Promise<void>;
  listIndexes(): Promise<IndexSpec[]>;
  createIndex(key: IndexKey): Promise<string>;
  dropIndex(name: string): Promise<void>;
}

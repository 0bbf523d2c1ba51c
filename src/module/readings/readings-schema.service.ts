// src/module/readings/readings-schema.service.ts
import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { LoggerService } from '../../common/logger/logger.service';
import {
  NamespaceExistsError,
  SchemaSetupError,
  TelemetryError,
} from '../../common/errors/telemetry.errors';
import { ALERT_ARRAY_FIELDS, TIME_SERIES_OPTIONS } from './readings.schema';
import { IndexKey, IndexSpec, READINGS_STORE, ReadingsStore } from './readings.store';

/** Indexes the query layer relies on, in creation order. */
export const REQUIRED_INDEXES: readonly IndexKey[] = [
  { timestamp: -1 },
  { 'metadata.location': 1 },
  { 'metadata.building': 1 },
  { 'metadata.room': 1 },
  { timestamp: -1, 'metadata.location': 1, 'metadata.building': 1 },
];

const sameKey = (a: IndexSpec['key'], b: IndexKey): boolean => {
  const left = Object.entries(a);
  const right = Object.entries(b);
  return (
    left.length === right.length &&
    left.every(([field, dir], i) => right[i][0] === field && right[i][1] === dir)
  );
};

/** An index that touches any of the per-alert array fields. */
export const isAlertArrayIndex = (index: IndexSpec): boolean =>
  Object.keys(index.key).some((field) =>
    (ALERT_ARRAY_FIELDS as readonly string[]).includes(field),
  );

export interface SchemaSetupReport {
  collectionCreated: boolean;
  droppedIndexes: string[];
  createdIndexes: string[];
}

@Injectable()
export class ReadingsSchemaService implements OnModuleInit {
  constructor(
    @Inject(READINGS_STORE) private readonly store: ReadingsStore,
    private readonly logger: LoggerService,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.ensureSchema();
  }

  /**
   * Idempotent: creates the time-series collection when missing, drops
   * indexes on alert arrays left over from older layouts, then creates
   * whichever required indexes are absent.
   */
  async ensureSchema(): Promise<SchemaSetupReport> {
    const collection = this.store.collectionName;
    try {
      const collectionCreated = await this.ensureCollection(collection);
      const existing = await this.store.listIndexes();
      const droppedIndexes = await this.dropAlertArrayIndexes(existing);
      const createdIndexes = await this.createMissingIndexes(
        existing.filter((idx) => !droppedIndexes.includes(idx.name)),
      );

      this.logger.log(
        `✅  Schema ready for "${collection}" (created: ${collectionCreated}, ` +
          `indexes added: ${createdIndexes.length}, dropped: ${droppedIndexes.length})`,
        ReadingsSchemaService.name,
      );
      return { collectionCreated, droppedIndexes, createdIndexes };
    } catch (err) {
      if (err instanceof SchemaSetupError) throw err;
      throw new SchemaSetupError(`Schema setup for "${collection}" failed`, { cause: err });
    }
  }

  private async ensureCollection(collection: string): Promise<boolean> {
    if (await this.store.collectionExists()) {
      this.logger.debug(`Time-series collection "${collection}" already exists`, ReadingsSchemaService.name);
      return false;
    }

    this.logger.log(`Creating time-series collection "${collection}"`, ReadingsSchemaService.name);
    try {
      await this.store.createTimeSeriesCollection(TIME_SERIES_OPTIONS);
      return true;
    } catch (err) {
      if (err instanceof NamespaceExistsError) {
        // another instance won the race
        this.logger.log(`Time-series collection "${collection}" was created concurrently`, ReadingsSchemaService.name);
        return false;
      }
      throw err;
    }
  }

  private async dropAlertArrayIndexes(existing: IndexSpec[]): Promise<string[]> {
    const dropped: string[] = [];
    for (const index of existing.filter(isAlertArrayIndex)) {
      try {
        await this.store.dropIndex(index.name);
        dropped.push(index.name);
        this.logger.log(`Dropped incompatible index ${index.name}`, ReadingsSchemaService.name);
      } catch (err) {
        const detail = err instanceof TelemetryError && err.cause instanceof Error
          ? err.cause.message
          : String(err);
        this.logger.warn(`Could not drop index ${index.name}: ${detail}`, ReadingsSchemaService.name);
      }
    }
    return dropped;
  }

  private async createMissingIndexes(existing: IndexSpec[]): Promise<string[]> {
    const created: string[] = [];
    for (const key of REQUIRED_INDEXES) {
      if (existing.some((idx) => sameKey(idx.key, key))) continue;
      created.push(await this.store.createIndex(key));
    }
    return created;
  }
}

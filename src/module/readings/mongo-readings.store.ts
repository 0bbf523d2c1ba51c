// src/module/readings/mongo-readings.store.ts
import { Injectable } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, Model, PipelineStage, isValidObjectId, mongo } from 'mongoose';
import {
  ConnectionError,
  NamespaceExistsError,
  QueryError,
  SchemaSetupError,
  WriteError,
} from '../../common/errors/telemetry.errors';
import { PersistedReading, Reading } from './readings.schema';
import { fromPersisted, toPersisted } from './readings.mapper';
import { predicateMatch } from './readings.filters';
import { ReadingPredicate, StoredReading } from './readings.types';
import { IndexKey, IndexSpec, ReadingsStore, TimeSeriesOptions } from './readings.store';

/** MongoServerError code for "collection already exists". */
const NAMESPACE_EXISTS = 48;

@Injectable()
export class MongoReadingsStore implements ReadingsStore {
  constructor(
    @InjectModel(Reading.name)
    private readonly readingModel: Model<Reading>,
    @InjectConnection() private readonly conn: Connection,
  ) {}

  get collectionName(): string {
    return this.readingModel.collection.collectionName;
  }

  async insert(reading: StoredReading): Promise<string> {
    try {
      const created = await this.readingModel.create(toPersisted(reading));
      return created._id.toString();
    } catch (err) {
      throw new WriteError(`Insert into ${this.collectionName} failed`, { cause: err });
    }
  }

  async findById(id: string): Promise<StoredReading | null> {
    if (!isValidObjectId(id)) return null;

    try {
      const doc = await this.readingModel
        .findById(id)
        .lean<PersistedReading>()
        .exec();
      return doc ? fromPersisted(doc) : null;
    } catch (err) {
      throw new QueryError(`Lookup of reading ${id} failed`, { cause: err });
    }
  }

  async deleteWhere(predicate: ReadingPredicate): Promise<number> {
    try {
      const res = await this.readingModel.deleteMany(predicateMatch(predicate)).exec();
      return res.deletedCount;
    } catch (err) {
      throw new QueryError(`Delete from ${this.collectionName} failed`, { cause: err });
    }
  }

  async runAggregation<T>(pipeline: PipelineStage[]): Promise<T[]> {
    try {
      return await this.readingModel.aggregate<T>(pipeline).exec();
    } catch (err) {
      throw new QueryError(`Aggregation on ${this.collectionName} failed`, { cause: err });
    }
  }

  /* ---------- collection administration ---------- */

  async collectionExists(): Promise<boolean> {
    const db = this.database();
    try {
      const found = await db
        .listCollections({ name: this.collectionName }, { nameOnly: true })
        .toArray();
      return found.length > 0;
    } catch (err) {
      throw new SchemaSetupError('Listing collections failed', { cause: err });
    }
  }

  async createTimeSeriesCollection(options: TimeSeriesOptions): Promise<void> {
    const db = this.database();
    try {
      await db.createCollection(this.collectionName, { timeseries: { ...options } });
    } catch (err) {
      if (err instanceof mongo.MongoServerError && err.code === NAMESPACE_EXISTS) {
        throw new NamespaceExistsError(this.collectionName, { cause: err });
      }
      throw new SchemaSetupError(
        `Creating time-series collection ${this.collectionName} failed`,
        { cause: err },
      );
    }
  }

  async listIndexes(): Promise<IndexSpec[]> {
    try {
      const infos = await this.readingModel.collection.indexes();
      return infos.map((info) => ({ name: String(info.name), key: { ...info.key } }));
    } catch (err) {
      throw new SchemaSetupError(`Listing indexes of ${this.collectionName} failed`, { cause: err });
    }
  }

  async createIndex(key: IndexKey): Promise<string> {
    try {
      return await this.readingModel.collection.createIndex(key);
    } catch (err) {
      throw new SchemaSetupError(
        `Creating index ${JSON.stringify(key)} failed`,
        { cause: err },
      );
    }
  }

  async dropIndex(name: string): Promise<void> {
    try {
      await this.readingModel.collection.dropIndex(name);
    } catch (err) {
      throw new SchemaSetupError(`Dropping index ${name} failed`, { cause: err });
    }
  }

  private database() {
    const db = this.conn.db;
    if (!db) {
      throw new ConnectionError('MongoDB connection is not open');
    }
    return db;
  }
}

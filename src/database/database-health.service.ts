import { Injectable } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { LoggerService } from '../common/logger/logger.service';
import { ConnectionError } from '../common/errors/telemetry.errors';

/** Scratch collection, kept apart so probes never land in time-series data. */
export const HEALTH_COLLECTION = '__health';

export interface DatabaseStatus {
  connected: boolean;
  readyState: number;
}

@Injectable()
export class DatabaseHealthService {
  constructor(
    @InjectConnection() private readonly conn: Connection,
    private readonly logger: LoggerService,
  ) {}

  /** Admin ping plus an insert / read / delete round-trip on the scratch collection. */
  async checkHealth(): Promise<void> {
    const db = this.conn.db;
    if (!db) {
      throw new ConnectionError('MongoDB connection is not open');
    }

    try {
      await db.admin().ping();

      const probes = db.collection(HEALTH_COLLECTION);
      const { insertedId } = await probes.insertOne({
        test: 'health_check',
        timestamp: new Date(),
      });
      const echoed = await probes.findOne({ _id: insertedId });
      await probes.deleteOne({ _id: insertedId });

      if (!echoed) {
        throw new Error('probe document was not readable after insert');
      }
    } catch (err) {
      this.logger.failure('Database health check failed', err, DatabaseHealthService.name);
      throw new ConnectionError('Database health check failed', { cause: err });
    }

    this.logger.debug('Database health check passed', DatabaseHealthService.name);
  }

  /** Non-throwing liveness view for the /health endpoint. */
  async status(): Promise<DatabaseStatus> {
    const readyState = Number(this.conn.readyState);
    const db = this.conn.db;
    if (!db) return { connected: false, readyState };

    try {
      await db.admin().ping();
      return { connected: true, readyState };
    } catch (err) {
      this.logger.failure('Database ping failed', err, DatabaseHealthService.name);
      return { connected: false, readyState };
    }
  }
}

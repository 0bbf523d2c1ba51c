import { Module, OnModuleInit } from '@nestjs/common';
import { InjectConnection, MongooseModule } from '@nestjs/mongoose';
import { ConfigService } from '@nestjs/config';
import { Connection } from 'mongoose';
import { LoggerService } from '../common/logger/logger.service';
import { DatabaseHealthService } from './database-health.service';

@Module({
  imports: [
    // async so we can pull the URI and timeouts from ConfigService
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const timeoutMs = config.get<number>('mongo.timeoutMs') ?? 5000;
        return {
          uri: config.get<string>('mongo.uri'),
          dbName: config.get<string>('mongo.dbName'),
          serverSelectionTimeoutMS: timeoutMs,
          connectTimeoutMS: timeoutMs,
          socketTimeoutMS: timeoutMs,
          // a failed initial connection is fatal; no retry loop
          retryAttempts: 0,
        };
      },
    }),
  ],
  providers: [DatabaseHealthService],
  exports: [MongooseModule, DatabaseHealthService],
})
export class DatabaseModule implements OnModuleInit {
  constructor(
    @InjectConnection() private readonly conn: Connection,
    private readonly health: DatabaseHealthService,
    private readonly logger: LoggerService,
  ) {}

  async onModuleInit(): Promise<void> {
    this.conn.on('disconnected', () =>
      this.logger.warn('⚠️  MongoDB disconnected', DatabaseModule.name),
    );
    this.conn.on('reconnected', () =>
      this.logger.log('🔄  MongoDB re‑connected', DatabaseModule.name),
    );
    this.conn.on('error', (err: unknown) =>
      this.logger.failure('❌  MongoDB connection error', err, DatabaseModule.name),
    );

    // throws ConnectionError and aborts startup
    await this.health.checkHealth();
    this.logger.log('✅  MongoDB connection established', DatabaseModule.name);
  }
}

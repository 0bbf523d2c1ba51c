// src/module/readings/readings.module.ts
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '../../database/database.module';
import { Reading, ReadingSchema } from './readings.schema';
import { READINGS_STORE } from './readings.store';
import { MongoReadingsStore } from './mongo-readings.store';
import { ReadingsSchemaService } from './readings-schema.service';

@Module({
  imports: [
    // schema setup must run after the connection health check
    DatabaseModule,
    MongooseModule.forFeatureAsync([
      {
        name: Reading.name,
        inject: [ConfigService],
        // collection name is deployment config, not a schema constant
        useFactory: (config: ConfigService) => {
          const schema = ReadingSchema.clone();
          schema.set(
            'collection',
            config.get<string>('mongo.readingsCollection') ?? 'serverRoomLogs',
          );
          return schema;
        },
      },
    ]),
  ],
  providers: [
    { provide: READINGS_STORE, useClass: MongoReadingsStore },
    ReadingsSchemaService,
  ],
  exports: [READINGS_STORE, ReadingsSchemaService],
})
export class ReadingsModule {}

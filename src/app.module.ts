import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule } from './common/config/config.module';
import { DatabaseModule } from './database/database.module';
import { LoggerModule } from './common/logger/logger.module';
import { HealthModule } from './module/health/health.module';
import { ReadingsModule } from './module/readings/readings.module';
import { ThresholdsModule } from './module/thresholds/thresholds.module';
import { RetentionModule } from './module/retention/retention.module';
import { AnalyticsModule } from './module/analytics/analytics.module';
import { IngestionModule } from './module/ingestion/ingestion.module';

@Module({
  imports: [
    ConfigModule,
    LoggerModule,
    ScheduleModule.forRoot(),
    DatabaseModule,
    HealthModule,
    ReadingsModule,
    ThresholdsModule,
    RetentionModule,
    AnalyticsModule,
    IngestionModule,
  ],
})
export class AppModule {}

// src/module/analytics/analytics.module.ts
import { Module } from '@nestjs/common';
import { ReadingsModule } from '../readings/readings.module';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';
import { ExportService } from './export.service';

@Module({
  imports: [ReadingsModule],
  controllers: [AnalyticsController],
  providers: [AnalyticsService, ExportService],
  exports: [AnalyticsService],
})
export class AnalyticsModule {}

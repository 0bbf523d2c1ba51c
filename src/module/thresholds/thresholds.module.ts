// src/module/thresholds/thresholds.module.ts
import { Module } from '@nestjs/common';
import { ThresholdsController } from './thresholds.controller';
import { ThresholdsService } from './thresholds.service';
import { AlertReporterService } from './alert-reporter.service';

@Module({
  controllers: [ThresholdsController],
  providers: [ThresholdsService, AlertReporterService],
  exports: [ThresholdsService, AlertReporterService],
})
export class ThresholdsModule {}

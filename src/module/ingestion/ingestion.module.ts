// src/module/ingestion/ingestion.module.ts
import { Module } from '@nestjs/common';
import { ReadingsModule } from '../readings/readings.module';
import { ThresholdsModule } from '../thresholds/thresholds.module';
import { IngestionService } from './ingestion.service';
import { RANDOM_SOURCE, SensorSimulatorService } from './sensor-simulator.service';
import { ReadingsController } from './readings.controller';
import { IngestionController } from './ingestion.controller';

@Module({
  imports: [ReadingsModule, ThresholdsModule],
  controllers: [ReadingsController, IngestionController],
  providers: [
    { provide: RANDOM_SOURCE, useValue: Math.random },
    SensorSimulatorService,
    IngestionService,
  ],
  exports: [IngestionService],
})
export class IngestionModule {}

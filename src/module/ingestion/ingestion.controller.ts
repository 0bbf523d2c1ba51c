// src/module/ingestion/ingestion.controller.ts
import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { IngestionService } from './ingestion.service';
import { SensorSimulatorService } from './sensor-simulator.service';

@Controller('ingestion')
export class IngestionController {
  constructor(
    private readonly ingestion: IngestionService,
    private readonly simulator: SensorSimulatorService,
  ) {}

  @Get('status')
  status() {
    return {
      data: { ...this.ingestion.status(), sensor: this.simulator.info() },
    };
  }

  /** Runs one simulated cycle immediately, outside the cadence. */
  @Post('cycle')
  @HttpCode(HttpStatus.OK)
  async cycle() {
    const outcome = await this.ingestion.runCycle();
    return { data: outcome, message: `Cycle finished: ${outcome.status}` };
  }
}

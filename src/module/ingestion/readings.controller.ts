// src/module/ingestion/readings.controller.ts
import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Inject,
  NotFoundException,
  Param,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { READINGS_STORE, ReadingsStore } from '../readings/readings.store';
import { SensorReading } from '../readings/readings.types';
import { toPlain } from '../readings/readings.mapper';
import { IngestionService } from './ingestion.service';
import { CreateReadingDto } from './dto/reading.dto';

@Controller('readings')
export class ReadingsController {
  constructor(
    private readonly ingestion: IngestionService,
    @Inject(READINGS_STORE) private readonly store: ReadingsStore,
  ) {}

  /** Runs an externally produced reading through the same write path as the loop. */
  @Post()
  async create(@Body() body: CreateReadingDto) {
    const { temperature, humidity } = body.metrics;
    if (temperature === undefined && humidity === undefined) {
      throw new BadRequestException('A reading needs at least one metric');
    }

    const reading: SensorReading = {
      kind: 'reading',
      timestamp: body.timestamp ? new Date(body.timestamp) : new Date(),
      metadata: { ...body.metadata },
      metrics: {
        ...(temperature !== undefined && { temperature }),
        ...(humidity !== undefined && { humidity }),
      },
      alerts: [],
    };

    const outcome = await this.ingestion.ingest(reading);
    switch (outcome.status) {
      case 'stored':
        return { data: toPlain(outcome.reading), message: 'Reading stored' };
      case 'write_failed':
        throw new ServiceUnavailableException(`Reading dropped: ${outcome.reason}`);
      case 'unverified':
        throw new ServiceUnavailableException(
          `Reading ${outcome.id} could not be verified: ${outcome.reason}`,
        );
    }
  }

  @Get(':id')
  async findOne(@Param('id') id: string) {
    const reading = await this.store.findById(id);
    if (!reading) throw new NotFoundException(`Reading ${id} not found`);
    return { data: toPlain(reading) };
  }
}

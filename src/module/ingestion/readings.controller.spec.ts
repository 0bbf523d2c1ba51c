import { BadRequestException, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { LoggerService } from '../../common/logger/logger.service';
import { READINGS_STORE } from '../readings/readings.store';
import { ThresholdsService } from '../thresholds/thresholds.service';
import { AlertReporterService } from '../thresholds/alert-reporter.service';
import { InMemoryReadingsStore } from '../../../test/support/in-memory-readings.store';
import { silentLogger } from '../../../test/support/logger';
import { CreateReadingDto } from './dto/reading.dto';
import { IngestionService } from './ingestion.service';
import { ReadingsController } from './readings.controller';
import { RANDOM_SOURCE, SensorSimulatorService } from './sensor-simulator.service';

describe('ReadingsController', () => {
  let store: InMemoryReadingsStore;
  let controller: ReadingsController;

  const body = (metrics: CreateReadingDto['metrics']): CreateReadingDto => ({
    timestamp: '2025-03-10T12:00:00.000Z',
    metadata: {
      location: 'Test Campus',
      building: 'B1',
      room: 'ServerRoom',
      sensor_id: 'TEST001',
      sensor_type: 'environmental',
    },
    metrics,
  });

  beforeEach(async () => {
    store = new InMemoryReadingsStore();
    const moduleRef = await Test.createTestingModule({
      controllers: [ReadingsController],
      providers: [
        { provide: READINGS_STORE, useValue: store },
        { provide: LoggerService, useValue: silentLogger() },
        { provide: ConfigService, useValue: new ConfigService() },
        { provide: RANDOM_SOURCE, useValue: Math.random },
        ThresholdsService,
        AlertReporterService,
        SensorSimulatorService,
        IngestionService,
      ],
    }).compile();

    controller = moduleRef.get(ReadingsController);
  });

  it('stores a posted reading with its alerts', async () => {
    const result = await controller.create(body({ temperature: 81 }));

    expect(result.message).toBe('Reading stored');
    expect(result.data).toMatchObject({
      kind: 'reading',
      id: '000000000000000000000001',
      timestamp: '2025-03-10T12:00:00.000Z',
      metrics: { temperature: 81 },
      alerts: [{ type: 'TEMPERATURE_HIGH', severity: 'WARNING' }],
    });
  });

  it('needs at least one metric', async () => {
    await expect(controller.create(body({}))).rejects.toBeInstanceOf(BadRequestException);
    expect(store.docs.size).toBe(0);
  });

  it('answers 503 when the write is dropped', async () => {
    store.failInsert = true;
    await expect(controller.create(body({ humidity: 50 }))).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    );
  });

  it('reads a stored reading back by id', async () => {
    await controller.create(body({ humidity: 50 }));

    const found = await controller.findOne('000000000000000000000001');
    expect(found.data.timestamp).toBe('2025-03-10T12:00:00.000Z');
    await expect(controller.findOne('000000000000000000000009')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });
});

import { HealthState } from '../../src/module/readings/enums/alert.enum';
import {
  HealthStatusReading,
  Metrics,
  ReadingMetadata,
  SensorReading,
} from '../../src/module/readings/readings.types';
import { ThresholdConfig } from '../../src/module/thresholds/threshold-evaluator';

export const SERVER_ROOM: ThresholdConfig = {
  tempMin: 63,
  tempMax: 80,
  humidityMin: 40,
  humidityMax: 60,
};

export const metadata = (overrides: Partial<ReadingMetadata> = {}): ReadingMetadata => ({
  location: 'Test Campus',
  building: 'B1',
  room: 'ServerRoom',
  sensor_id: 'TEST001',
  sensor_type: 'environmental',
  ...overrides,
});

export const reading = (
  timestamp: Date,
  metrics: Metrics = { temperature: 70, humidity: 50 },
  meta: Partial<ReadingMetadata> = {},
): SensorReading => ({
  kind: 'reading',
  timestamp,
  metadata: metadata(meta),
  metrics,
  alerts: [],
});

export const healthStatus = (timestamp: Date): HealthStatusReading => ({
  kind: 'health_status',
  timestamp,
  metadata: metadata(),
  status: HealthState.OPTIMAL,
  message: 'All good',
  alerts: [],
});

import { ConfigService } from '@nestjs/config';
import { HealthState } from '../readings/enums/alert.enum';
import { HEALTHY_MESSAGE, RandomSource, SensorSimulatorService } from './sensor-simulator.service';

/** Replays the given values in a loop. */
const scripted = (...values: number[]): RandomSource => {
  let i = 0;
  return () => values[i++ % values.length];
};

const config = new ConfigService({
  sensor: { location: 'Test Campus', building: 'B1', room: 'Lab', sensorId: 'TEST001' },
  ingestion: { outOfRangeProbability: 0.1 },
});

describe('SensorSimulatorService', () => {
  it('draws from the safe band most of the time', () => {
    const simulator = new SensorSimulatorService(config, scripted(0.5));
    const now = new Date('2025-03-10T12:00:00.000Z');

    expect(simulator.generateReading(now)).toEqual({
      kind: 'reading',
      timestamp: now,
      metadata: {
        location: 'Test Campus',
        building: 'B1',
        room: 'Lab',
        sensor_id: 'TEST001',
        sensor_type: 'environmental',
      },
      metrics: { temperature: 70, humidity: 50 },
      alerts: [],
    });
  });

  it('makes low excursions between three and ten units under the band', () => {
    const simulator = new SensorSimulatorService(config, scripted(0.05, 0.2, 0));
    expect(simulator.generateValue('temperature')).toBe(55);
  });

  it('makes high excursions between three and ten units over the band', () => {
    const simulator = new SensorSimulatorService(config, scripted(0.05, 0.7, 0.5));
    expect(simulator.generateValue('humidity')).toBe(61.5);
  });

  it('rounds generated values to two decimals', () => {
    const simulator = new SensorSimulatorService(config, scripted(0.9, 0.123456));
    expect(simulator.generateValue('temperature')).toBe(66.23);
  });

  it('stays in the safe band when excursions are disabled', () => {
    const simulator = new SensorSimulatorService(config, Math.random);
    simulator.configure({ outOfRangeProbability: 0 });

    for (let i = 0; i < 200; i++) {
      const value = simulator.generateValue('temperature');
      expect(value).toBeGreaterThanOrEqual(65);
      expect(value).toBeLessThanOrEqual(75);
    }
  });

  it('clamps the excursion probability and hands out copies of its settings', () => {
    const simulator = new SensorSimulatorService(config, scripted(0.5));
    const info = simulator.configure({ outOfRangeProbability: 5, room: 'ServerRoom' });

    expect(info.outOfRangeProbability).toBe(1);
    expect(info.room).toBe('ServerRoom');

    info.safeRanges.temperature[0] = -100;
    expect(simulator.info().safeRanges.temperature).toEqual([65, 75]);
  });

  it('emits an optimal health status record', () => {
    const simulator = new SensorSimulatorService(config, scripted(0.5));
    const status = simulator.generateHealthStatus(new Date('2025-03-10T01:00:00.000Z'));

    expect(status.kind).toBe('health_status');
    expect(status.status).toBe(HealthState.OPTIMAL);
    expect(status.message).toBe(HEALTHY_MESSAGE);
  });
});

// src/module/ingestion/sensor-simulator.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthState } from '../readings/enums/alert.enum';
import {
  HealthStatusReading,
  Metric,
  ReadingMetadata,
  SensorReading,
} from '../readings/readings.types';

export const RANDOM_SOURCE = 'RANDOM_SOURCE';

/** Uniform in [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

export interface SimulatorSettings {
  location: string;
  building: string;
  room: string;
  sensorId: string;
  sensorType: string;
  safeRanges: Record<Metric, [min: number, max: number]>;
  outOfRangeProbability: number;
}

export const HEALTHY_MESSAGE = 'Server room environment is running within optimal parameters';

const round2 = (n: number) => Math.round(n * 100) / 100;

/**
 * Stand-in for the physical probe: mostly in-band values with an
 * occasional excursion 3–10 units past either edge of the safe band.
 */
@Injectable()
export class SensorSimulatorService {
  private settings: SimulatorSettings;

  constructor(
    config: ConfigService,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {
    this.settings = {
      location   : config.get<string>('sensor.location') ?? 'Main Campus',
      building   : config.get<string>('sensor.building') ?? 'B9',
      room       : config.get<string>('sensor.room') ?? 'ServerRoom',
      sensorId   : config.get<string>('sensor.sensorId') ?? 'SR001',
      sensorType : 'environmental',
      safeRanges : { temperature: [65, 75], humidity: [45, 55] },
      outOfRangeProbability: this.clamp(
        config.get<number>('ingestion.outOfRangeProbability') ?? 0.1,
      ),
    };
  }

  configure(patch: Partial<SimulatorSettings>): SimulatorSettings {
    const next = { ...this.settings, ...patch };
    next.outOfRangeProbability = this.clamp(next.outOfRangeProbability);
    this.settings = next;
    return this.info();
  }

  info(): SimulatorSettings {
    return {
      ...this.settings,
      safeRanges: {
        temperature: [...this.settings.safeRanges.temperature],
        humidity: [...this.settings.safeRanges.humidity],
      },
    };
  }

  generateValue(metric: Metric): number {
    const [min, max] = this.settings.safeRanges[metric];

    if (this.random() > this.settings.outOfRangeProbability) {
      return round2(this.uniform(min, max));
    }
    return this.random() < 0.5
      ? round2(this.uniform(min - 10, min - 3))
      : round2(this.uniform(max + 3, max + 10));
  }

  generateReading(now: Date = new Date()): SensorReading {
    return {
      kind: 'reading',
      timestamp: now,
      metadata: this.metadata(),
      metrics: {
        temperature: this.generateValue('temperature'),
        humidity: this.generateValue('humidity'),
      },
      alerts: [],
    };
  }

  generateHealthStatus(now: Date = new Date()): HealthStatusReading {
    return {
      kind: 'health_status',
      timestamp: now,
      metadata: this.metadata(),
      status: HealthState.OPTIMAL,
      message: HEALTHY_MESSAGE,
      alerts: [],
    };
  }

  private metadata(): ReadingMetadata {
    const s = this.settings;
    return {
      location: s.location,
      building: s.building,
      room: s.room,
      sensor_id: s.sensorId,
      sensor_type: s.sensorType,
    };
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  private clamp(p: number): number {
    return Math.max(0, Math.min(1, p));
  }
}

// src/module/readings/readings.types.ts
import { AlertType, HealthState, Severity } from './enums/alert.enum';

export type Metric = 'temperature' | 'humidity';

export interface ReadingMetadata {
  location: string;
  building: string;
  room: string;
  sensor_id: string;
  sensor_type: string;
}

/** Either metric may be missing; absence is never encoded as 0 or null. */
export interface Metrics {
  temperature?: number;
  humidity?: number;
}

export interface Alert {
  type: AlertType;
  message: string;
  severity: Severity;
}

export interface SensorReading {
  kind: 'reading';
  /** assigned by the store */
  id?: string;
  timestamp: Date;
  metadata: ReadingMetadata;
  metrics: Metrics;
  alerts: Alert[];
}

export interface HealthStatusReading {
  kind: 'health_status';
  id?: string;
  timestamp: Date;
  metadata: ReadingMetadata;
  status: HealthState;
  message: string;
  alerts: Alert[];
}

export type StoredReading = SensorReading | HealthStatusReading;

/** Optional equality filters on the immutable metadata block. */
export interface MetadataFilter {
  location?: string;
  building?: string;
  room?: string;
  sensor_id?: string;
}

/** Typed delete predicate; every present clause must hold. */
export interface ReadingPredicate {
  before?: Date;
  metadata?: MetadataFilter;
}

export const METADATA_FILTER_KEYS = [
  'location',
  'building',
  'room',
  'sensor_id',
] as const satisfies readonly (keyof MetadataFilter)[];

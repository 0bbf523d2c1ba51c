// src/module/readings/readings.schema.ts
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { AlertType, HealthState, Severity } from './enums/alert.enum';

@Schema({ _id: false, versionKey: false })
export class ReadingMetadataFields {
  @Prop({ required: true, type: String })
  location!: string;

  @Prop({ required: true, type: String })
  building!: string;

  @Prop({ required: true, type: String })
  room!: string;

  @Prop({ required: true, type: String })
  sensor_id!: string;

  @Prop({ required: true, type: String })
  sensor_type!: string;
}

const ReadingMetadataSchema = SchemaFactory.createForClass(ReadingMetadataFields);

@Schema({ _id: false, versionKey: false })
export class MetricsFields {
  @Prop({ type: Number })
  temperature?: number; // °F

  @Prop({ type: Number })
  humidity?: number; // %
}

const MetricsSchema = SchemaFactory.createForClass(MetricsFields);

/**
 * One document of the time-series collection. The collection itself is
 * created by ReadingsSchemaService (timeField/metaField/granularity), so
 * Mongoose must neither auto-create it nor build indexes on it.
 *
 * Alerts are stored as three index-aligned arrays; all three are omitted
 * when a reading has no alerts.
 */
@Schema({
  collection: 'serverRoomLogs',
  versionKey: false,
  autoCreate: false,
  autoIndex: false,
})
export class Reading {
  @Prop({ required: true, type: Date })
  timestamp!: Date;

  @Prop({ required: true, type: ReadingMetadataSchema })
  metadata!: ReadingMetadataFields;

  @Prop({ type: MetricsSchema })
  metrics?: MetricsFields;

  @Prop({ type: [String], enum: AlertType, default: undefined })
  alert_type?: AlertType[];

  @Prop({ type: [String], default: undefined })
  alert_message?: string[];

  @Prop({ type: [String], enum: Severity, default: undefined })
  severity?: Severity[];

  /** health-status documents only */
  @Prop({ type: String, enum: HealthState })
  status?: HealthState;

  @Prop({ type: String })
  message?: string;
}

export type ReadingDocument = HydratedDocument<Reading>;

/** Shape of a document as read back with `.lean()` or from an aggregation. */
export type PersistedReading = Reading & { _id?: Types.ObjectId };

export const ReadingSchema = SchemaFactory.createForClass(Reading);

export const TIME_SERIES_OPTIONS = {
  timeField: 'timestamp',
  metaField: 'metadata',
  granularity: 'minutes',
} as const;

/** Fields that hold one entry per alert and therefore must never be indexed. */
export const ALERT_ARRAY_FIELDS = ['alert_type', 'alert_message', 'severity'] as const;

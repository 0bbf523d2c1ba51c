// src/module/analytics/dto/analytics.dto.ts
import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsISO8601,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { MetadataFilter, Metric } from '../../readings/readings.types';

export class MetadataFilterQuery {
  @IsOptional() @IsString() location?: string;
  @IsOptional() @IsString() building?: string;
  @IsOptional() @IsString() room?: string;
  @IsOptional() @IsString() sensorId?: string;
}

export function toMetadataFilter(q: MetadataFilterQuery): MetadataFilter {
  return {
    location: q.location,
    building: q.building,
    room: q.room,
    sensor_id: q.sensorId,
  };
}

export class RecentQuery extends MetadataFilterQuery {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  hours = 24;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10_000)
  limit?: number;
}

export class DaysQuery extends MetadataFilterQuery {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  days = 7;
}

export class RangeQuery extends MetadataFilterQuery {
  @IsISO8601() from!: string;
  @IsISO8601() to!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10_000)
  limit = 1000;
}

export class SearchQuery extends MetadataFilterQuery {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit = 100;
}

export const METRICS: readonly Metric[] = ['temperature', 'humidity'];

export class TrendParams {
  @IsIn(METRICS)
  metric!: Metric;
}

export class ExportBody {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  days = 1;

  /** file name only; directories are stripped */
  @IsOptional()
  @IsString()
  @Matches(/^[\w.-]+\.json$/)
  filename = 'time_series_export.json';
}

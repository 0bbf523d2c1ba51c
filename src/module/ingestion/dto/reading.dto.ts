// src/module/ingestion/dto/reading.dto.ts
import { Type } from 'class-transformer';
import {
  IsDefined,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

class ReadingMetadataDto {
  @IsString() @IsNotEmpty() location!: string;
  @IsString() @IsNotEmpty() building!: string;
  @IsString() @IsNotEmpty() room!: string;
  @IsString() @IsNotEmpty() sensor_id!: string;

  @IsOptional()
  @IsString()
  sensor_type = 'environmental';
}

class MetricsDto {
  @IsOptional() @IsNumber() temperature?: number; // °F
  @IsOptional() @IsNumber() humidity?: number; // %
}

export class CreateReadingDto {
  /** defaults to the time of receipt */
  @IsOptional()
  @IsISO8601()
  timestamp?: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => ReadingMetadataDto)
  metadata!: ReadingMetadataDto;

  @IsDefined()
  @ValidateNested()
  @Type(() => MetricsDto)
  metrics!: MetricsDto;
}

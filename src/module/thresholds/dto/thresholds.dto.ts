// src/module/thresholds/dto/thresholds.dto.ts
import { Type } from 'class-transformer';
import { IsNumber } from 'class-validator';

export class UpdateThresholdsDto {
  @Type(() => Number)
  @IsNumber()
  tempMin!: number; // °F

  @Type(() => Number)
  @IsNumber()
  tempMax!: number;

  @Type(() => Number)
  @IsNumber()
  humidityMin!: number; // %

  @Type(() => Number)
  @IsNumber()
  humidityMax!: number;
}

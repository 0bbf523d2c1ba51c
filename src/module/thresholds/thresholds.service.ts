// src/module/thresholds/thresholds.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerService } from '../../common/logger/logger.service';
import { ConfigurationError } from '../../common/errors/telemetry.errors';
import { ThresholdConfig } from './threshold-evaluator';

export const RECOMMENDED_TEMPERATURE: readonly [number, number] = [50, 100];
export const RECOMMENDED_HUMIDITY: readonly [number, number] = [20, 80];

export const INVERTED_TEMPERATURE = 'Temperature minimum must be less than maximum';
export const INVERTED_HUMIDITY = 'Humidity minimum must be less than maximum';

export interface ThresholdUpdateResult {
  thresholds: ThresholdConfig;
  warnings: string[];
}

/** Every problem with a threshold set, in a fixed order. */
export function validateThresholds(config: ThresholdConfig): string[] {
  const warnings: string[] = [];
  const [tLow, tHigh] = RECOMMENDED_TEMPERATURE;
  const [hLow, hHigh] = RECOMMENDED_HUMIDITY;

  if (config.tempMin < tLow || config.tempMax > tHigh) {
    warnings.push(`Temperature thresholds are outside recommended range (${tLow}°F - ${tHigh}°F)`);
  }
  if (config.humidityMin < hLow || config.humidityMax > hHigh) {
    warnings.push(`Humidity thresholds are outside recommended range (${hLow}% - ${hHigh}%)`);
  }
  if (config.tempMin >= config.tempMax) {
    warnings.push(INVERTED_TEMPERATURE);
  }
  if (config.humidityMin >= config.humidityMax) {
    warnings.push(INVERTED_HUMIDITY);
  }
  return warnings;
}

/**
 * Process-lifetime holder of the active thresholds. Callers read a
 * snapshot with get() and pass it to the evaluator; nothing else keeps
 * a reference to the mutable state.
 */
@Injectable()
export class ThresholdsService {
  private current: ThresholdConfig;

  constructor(
    config: ConfigService,
    private readonly logger: LoggerService,
  ) {
    const initial: ThresholdConfig = {
      tempMin     : config.get<number>('thresholds.tempMin') ?? 63,
      tempMax     : config.get<number>('thresholds.tempMax') ?? 80,
      humidityMin : config.get<number>('thresholds.humidityMin') ?? 40,
      humidityMax : config.get<number>('thresholds.humidityMax') ?? 60,
    };
    // a bad environment is fatal here, same as a bad update
    this.current = initial;
    this.update(initial);
  }

  get(): ThresholdConfig {
    return { ...this.current };
  }

  validate(config: ThresholdConfig): string[] {
    return validateThresholds(config);
  }

  /**
   * Applies a new threshold set. Inverted bounds (min >= max) reject the
   * whole update; recommended-range warnings are returned but do not block.
   */
  update(next: ThresholdConfig): ThresholdUpdateResult {
    const warnings = this.validate(next);
    if (warnings.includes(INVERTED_TEMPERATURE) || warnings.includes(INVERTED_HUMIDITY)) {
      this.logger.error(
        `Rejected threshold update: ${warnings.join('; ')}`,
        undefined,
        ThresholdsService.name,
      );
      throw new ConfigurationError(warnings);
    }

    this.current = { ...next };
    for (const warning of warnings) {
      this.logger.warn(`Threshold Warning: ${warning}`, ThresholdsService.name);
    }
    this.logger.log(
      `✅ Thresholds updated - Temp: ${next.tempMin}°F to ${next.tempMax}°F, ` +
        `Humidity: ${next.humidityMin}% to ${next.humidityMax}%`,
      ThresholdsService.name,
    );
    return { thresholds: this.get(), warnings };
  }
}

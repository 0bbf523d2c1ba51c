import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../../common/errors/telemetry.errors';
import { silentLogger } from '../../../test/support/logger';
import { SERVER_ROOM } from '../../../test/support/fixtures';
import {
  INVERTED_HUMIDITY,
  INVERTED_TEMPERATURE,
  ThresholdsService,
  validateThresholds,
} from './thresholds.service';

describe('ThresholdsService', () => {
  const build = (thresholds: Record<string, number> = {}) =>
    new ThresholdsService(new ConfigService({ thresholds }), silentLogger());

  it('falls back to the server room defaults', () => {
    expect(build().get()).toEqual(SERVER_ROOM);
  });

  it('reads initial bounds from configuration', () => {
    const service = build({ tempMin: 60, tempMax: 78, humidityMin: 35, humidityMax: 65 });
    expect(service.get()).toEqual({ tempMin: 60, tempMax: 78, humidityMin: 35, humidityMax: 65 });
  });

  it('refuses to start with inverted bounds', () => {
    expect(() => build({ tempMin: 90, tempMax: 80 })).toThrow(ConfigurationError);
  });

  it('hands out copies of the active thresholds', () => {
    const service = build();
    const snapshot = service.get();
    snapshot.tempMax = 1000;
    expect(service.get().tempMax).toBe(80);
  });

  it('applies an update with recommended-range warnings', () => {
    const service = build();
    const result = service.update({ tempMin: 45, tempMax: 80, humidityMin: 40, humidityMax: 60 });

    expect(result.warnings).toEqual([
      'Temperature thresholds are outside recommended range (50°F - 100°F)',
    ]);
    expect(service.get().tempMin).toBe(45);
  });

  it('rejects inverted bounds and keeps the previous thresholds', () => {
    const service = build();
    let caught: unknown;
    try {
      service.update({ tempMin: 80, tempMax: 80, humidityMin: 70, humidityMax: 40 });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.warnings).toEqual([INVERTED_TEMPERATURE, INVERTED_HUMIDITY]);
    }
    expect(service.get()).toEqual(SERVER_ROOM);
  });
});

describe('validateThresholds', () => {
  it('is clean for the default server room band', () => {
    expect(validateThresholds(SERVER_ROOM)).toEqual([]);
  });

  it('lists every problem in a fixed order', () => {
    expect(
      validateThresholds({ tempMin: 120, tempMax: 110, humidityMin: 10, humidityMax: 5 }),
    ).toEqual([
      'Temperature thresholds are outside recommended range (50°F - 100°F)',
      'Humidity thresholds are outside recommended range (20% - 80%)',
      INVERTED_TEMPERATURE,
      INVERTED_HUMIDITY,
    ]);
  });
});

import { AlertType, Severity } from '../readings/enums/alert.enum';
import { silentLogger } from '../../../test/support/logger';
import { AlertReporterService, summarizeAlerts } from './alert-reporter.service';

describe('AlertReporterService', () => {
  const critical = {
    type: AlertType.TEMPERATURE_HIGH,
    message: 'Temperature 85°F is above maximum threshold 80°F',
    severity: Severity.CRITICAL,
  };
  const warning = {
    type: AlertType.HUMIDITY_LOW,
    message: 'Humidity 39% is below minimum threshold 40%',
    severity: Severity.WARNING,
  };

  it('summarizes an empty list', () => {
    expect(summarizeAlerts([])).toBe('No alerts generated');
  });

  it('summarizes one line per alert', () => {
    expect(summarizeAlerts([critical, warning])).toBe(
      [
        'Generated 2 alerts:',
        '  - CRITICAL: TEMPERATURE_HIGH - Temperature 85°F is above maximum threshold 80°F',
        '  - WARNING: HUMIDITY_LOW - Humidity 39% is below minimum threshold 40%',
      ].join('\n'),
    );
  });

  it('routes alerts to the log level matching their severity', () => {
    const logger = silentLogger();
    const error = jest.spyOn(logger, 'error');
    const warn = jest.spyOn(logger, 'warn');
    const log = jest.spyOn(logger, 'log');

    new AlertReporterService(logger).logAlerts([
      critical,
      warning,
      { type: AlertType.HEALTH_STATUS, message: 'All good', severity: Severity.INFO },
    ]);

    expect(error).toHaveBeenCalledWith(
      '🚨 CRITICAL ALERT: Temperature 85°F is above maximum threshold 80°F',
      undefined,
      'AlertReporterService',
    );
    expect(warn).toHaveBeenCalledWith(
      '⚠️ WARNING: Humidity 39% is below minimum threshold 40%',
      'AlertReporterService',
    );
    expect(log).toHaveBeenCalledWith('ℹ️ INFO: All good', 'AlertReporterService');
  });
});

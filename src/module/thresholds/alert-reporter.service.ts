// src/module/thresholds/alert-reporter.service.ts
import { Injectable } from '@nestjs/common';
import { LoggerService } from '../../common/logger/logger.service';
import { Severity } from '../readings/enums/alert.enum';
import { Alert } from '../readings/readings.types';

export function summarizeAlerts(alerts: readonly Alert[]): string {
  if (alerts.length === 0) return 'No alerts generated';

  const lines = alerts.map((a) => `  - ${a.severity}: ${a.type} - ${a.message}`);
  return [`Generated ${alerts.length} alerts:`, ...lines].join('\n');
}

/** Log output for evaluated alerts; evaluation itself stays pure. */
@Injectable()
export class AlertReporterService {
  constructor(private readonly logger: LoggerService) {}

  logAlerts(alerts: readonly Alert[]): void {
    for (const alert of alerts) {
      switch (alert.severity) {
        case Severity.CRITICAL:
          this.logger.error(`🚨 CRITICAL ALERT: ${alert.message}`, undefined, AlertReporterService.name);
          break;
        case Severity.WARNING:
          this.logger.warn(`⚠️ WARNING: ${alert.message}`, AlertReporterService.name);
          break;
        case Severity.INFO:
          this.logger.log(`ℹ️ INFO: ${alert.message}`, AlertReporterService.name);
          break;
      }
    }
  }

  summarize(alerts: readonly Alert[]): string {
    return summarizeAlerts(alerts);
  }
}

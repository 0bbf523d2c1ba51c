export enum AlertType {
  TEMPERATURE_LOW  = 'TEMPERATURE_LOW',
  TEMPERATURE_HIGH = 'TEMPERATURE_HIGH',
  HUMIDITY_LOW     = 'HUMIDITY_LOW',
  HUMIDITY_HIGH    = 'HUMIDITY_HIGH',
  HEALTH_STATUS    = 'HEALTH_STATUS',
}

export enum Severity {
  INFO     = 'INFO',
  WARNING  = 'WARNING',
  CRITICAL = 'CRITICAL',
}

export enum HealthState {
  OPTIMAL  = 'OPTIMAL',
  DEGRADED = 'DEGRADED',
}

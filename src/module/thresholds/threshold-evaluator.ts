// src/module/thresholds/threshold-evaluator.ts
import { AlertType, Severity } from '../readings/enums/alert.enum';
import { Alert, Metric, Metrics } from '../readings/readings.types';

export interface ThresholdConfig {
  tempMin: number;
  tempMax: number;
  humidityMin: number;
  humidityMax: number;
}

/** Distance from the violated bound up to which a breach is only a warning. */
export const WARNING_MARGIN = 2;

interface MetricRule {
  label: string;
  unit: string;
  low: AlertType;
  high: AlertType;
  bounds: (config: ThresholdConfig) => [min: number, max: number];
}

const RULES: Record<Metric, MetricRule> = {
  temperature: {
    label: 'Temperature',
    unit: '°F',
    low: AlertType.TEMPERATURE_LOW,
    high: AlertType.TEMPERATURE_HIGH,
    bounds: (c) => [c.tempMin, c.tempMax],
  },
  humidity: {
    label: 'Humidity',
    unit: '%',
    low: AlertType.HUMIDITY_LOW,
    high: AlertType.HUMIDITY_HIGH,
    bounds: (c) => [c.humidityMin, c.humidityMax],
  },
};

// temperature first, so alert order is stable
const EVALUATION_ORDER: readonly Metric[] = ['temperature', 'humidity'];

export function classifySeverity(value: number, violatedBound: number): Severity {
  return Math.abs(value - violatedBound) <= WARNING_MARGIN
    ? Severity.WARNING
    : Severity.CRITICAL;
}

/** Zero or one alert for a single metric; bounds are inclusive. */
export function evaluateMetric(
  metric: Metric,
  value: number,
  config: ThresholdConfig,
): Alert | null {
  const rule = RULES[metric];
  const [min, max] = rule.bounds(config);

  if (value < min) {
    return {
      type: rule.low,
      message: `${rule.label} ${value}${rule.unit} is below minimum threshold ${min}${rule.unit}`,
      severity: classifySeverity(value, min),
    };
  }
  if (value > max) {
    return {
      type: rule.high,
      message: `${rule.label} ${value}${rule.unit} is above maximum threshold ${max}${rule.unit}`,
      severity: classifySeverity(value, max),
    };
  }
  return null;
}

export function evaluateReading(metrics: Metrics, config: ThresholdConfig): Alert[] {
  const alerts: Alert[] = [];
  for (const metric of EVALUATION_ORDER) {
    const value = metrics[metric];
    if (value === undefined) continue;

    const alert = evaluateMetric(metric, value, config);
    if (alert) alerts.push(alert);
  }
  return alerts;
}

export function healthStatusAlert(message: string): Alert {
  return { type: AlertType.HEALTH_STATUS, message, severity: Severity.INFO };
}

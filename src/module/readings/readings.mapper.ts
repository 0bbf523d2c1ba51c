// src/module/readings/readings.mapper.ts
import { Alert, Metrics, StoredReading } from './readings.types';
import { PersistedReading, Reading } from './readings.schema';

function metricsOf(doc: PersistedReading): Metrics {
  const metrics: Metrics = {};
  if (typeof doc.metrics?.temperature === 'number') {
    metrics.temperature = doc.metrics.temperature;
  }
  if (typeof doc.metrics?.humidity === 'number') {
    metrics.humidity = doc.metrics.humidity;
  }
  return metrics;
}

/** Zips the three aligned arrays back into alerts; a short array ends the list. */
function alertsOf(doc: PersistedReading): Alert[] {
  const types = doc.alert_type ?? [];
  const messages = doc.alert_message ?? [];
  const severities = doc.severity ?? [];
  const size = Math.min(types.length, messages.length, severities.length);

  const alerts: Alert[] = [];
  for (let i = 0; i < size; i++) {
    alerts.push({ type: types[i], message: messages[i], severity: severities[i] });
  }
  return alerts;
}

export function toPersisted(reading: StoredReading): Reading {
  const doc: Reading = {
    timestamp: reading.timestamp,
    metadata: { ...reading.metadata },
  };

  if (reading.kind === 'reading') {
    doc.metrics = { ...reading.metrics };
  } else {
    doc.status = reading.status;
    doc.message = reading.message;
  }

  if (reading.alerts.length > 0) {
    doc.alert_type = reading.alerts.map((a) => a.type);
    doc.alert_message = reading.alerts.map((a) => a.message);
    doc.severity = reading.alerts.map((a) => a.severity);
  }

  return doc;
}

export function fromPersisted(doc: PersistedReading): StoredReading {
  const base = {
    id: doc._id?.toString(),
    timestamp: doc.timestamp,
    metadata: { ...doc.metadata },
    alerts: alertsOf(doc),
  };

  if (doc.status !== undefined && doc.metrics === undefined) {
    return {
      ...base,
      kind: 'health_status',
      status: doc.status,
      message: doc.message ?? '',
    };
  }

  return { ...base, kind: 'reading', metrics: metricsOf(doc) };
}

/** JSON-friendly view used by the export file and HTTP responses. */
export function toPlain(reading: StoredReading) {
  return { ...reading, timestamp: reading.timestamp.toISOString() };
}

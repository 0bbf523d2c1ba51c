const num = (value: string | undefined, fallback: number): number =>
  value === undefined || value === '' ? fallback : Number(value);

export default () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  mongo: {
    uri: process.env.MONGO_URI,
    dbName: process.env.MONGO_DB_NAME ?? 'monitoringDB',
    readingsCollection: process.env.READINGS_COLLECTION ?? 'serverRoomLogs',
    // connect / server-selection / socket
    timeoutMs: 5000,
  },
  logLevel: process.env.LOG_LEVEL ?? 'debug',
  logFile: process.env.LOG_FILE,
  retention: {
    days: num(process.env.RETENTION_DAYS, 30),
  },
  ingestion: {
    intervalMs: num(process.env.INGESTION_INTERVAL_MS, 60_000),
    simulationEnabled: (process.env.SIMULATION_ENABLED ?? 'true').toLowerCase() === 'true',
    outOfRangeProbability: num(process.env.SIMULATION_OUT_OF_RANGE_PROBABILITY, 0.1),
  },
  sensor: {
    location : process.env.SENSOR_LOCATION ?? 'Main Campus',
    building : process.env.SENSOR_BUILDING ?? 'B9',
    room     : process.env.SENSOR_ROOM ?? 'ServerRoom',
    sensorId : process.env.SENSOR_ID ?? 'SR001',
  },
  thresholds: {
    tempMin     : num(process.env.TEMP_MIN, 63),
    tempMax     : num(process.env.TEMP_MAX, 80),
    humidityMin : num(process.env.HUMIDITY_MIN, 40),
    humidityMax : num(process.env.HUMIDITY_MAX, 60),
  },
  exportDir: process.env.EXPORT_DIR ?? './exports',
});

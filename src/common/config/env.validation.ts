import * as Joi from 'joi';

export const envValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(3000),
  MONGO_URI: Joi.string()
    .uri({ scheme: ['mongodb', 'mongodb+srv'] })
    .required(),
  MONGO_DB_NAME: Joi.string().default('monitoringDB'),
  READINGS_COLLECTION: Joi.string().default('serverRoomLogs'),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly')
    .default('debug'),
  LOG_FILE: Joi.string().optional(),
  // Retention
  RETENTION_DAYS: Joi.number().positive().default(30),
  // Ingestion cadence and simulator
  INGESTION_INTERVAL_MS: Joi.number().integer().min(1000).default(60000),
  SIMULATION_ENABLED: Joi.boolean().default(true),
  SIMULATION_OUT_OF_RANGE_PROBABILITY: Joi.number().min(0).max(1).default(0.1),
  SENSOR_LOCATION: Joi.string().optional(),
  SENSOR_BUILDING: Joi.string().optional(),
  SENSOR_ROOM: Joi.string().optional(),
  SENSOR_ID: Joi.string().optional(),
  // Initial thresholds (°F / %)
  TEMP_MIN: Joi.number().default(63),
  TEMP_MAX: Joi.number().default(80),
  HUMIDITY_MIN: Joi.number().default(40),
  HUMIDITY_MAX: Joi.number().default(60),
  EXPORT_DIR: Joi.string().default('./exports'),
});

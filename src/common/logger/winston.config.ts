/**
 * Central Winston transport/format factory.
 * Console always; a JSON file transport when LOG_FILE is set.
 */
import { utilities as nestFormat } from 'nest-winston';
import { format, transports } from 'winston';
import type { LoggerOptions } from 'winston';
import type { ConfigService } from '@nestjs/config';

export const buildWinstonOptions = (config: ConfigService): LoggerOptions => {
  const logLevel = config.get<string>('logLevel') ?? 'debug';
  const logFile = config.get<string>('logFile');

  const consoleTransport = new transports.Console({
    format: format.combine(
      format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      // Colorize only in non‑prod for readability:
      format.colorize({ all: process.env.NODE_ENV !== 'production' }),
      nestFormat.format.nestLike('Telemetry', { prettyPrint: true }),
    ),
  });

  if (!logFile) {
    return { level: logLevel, transports: [consoleTransport] };
  }

  // plain JSON lines on disk, one per event
  const file = new transports.File({
    filename: logFile,
    format: format.combine(format.timestamp(), format.json()),
  });

  return { level: logLevel, transports: [consoleTransport, file] };
};

import { createLogger, transports } from 'winston';
import { LoggerService } from '../../src/common/logger/logger.service';

/** Real LoggerService over a Winston instance that writes nowhere. */
export function silentLogger(): LoggerService {
  return new LoggerService(
    createLogger({
      silent: true,
      transports: [new transports.Console({ silent: true })],
    }),
  );
}

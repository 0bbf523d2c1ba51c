/**
 * Thin wrapper over the Winston instance so providers depend on one
 * injectable that still satisfies Nest's LoggerService interface.
 */
import {
  Injectable,
  LoggerService as NestLogger,
  Inject,
} from '@nestjs/common';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import type { Logger } from 'winston';

@Injectable()
export class LoggerService implements NestLogger {
  constructor(
    @Inject(WINSTON_MODULE_PROVIDER) private readonly logger: Logger,
  ) {}

  log(message: string, context?: string) {
    this.logger.info(message, { context });
  }
  error(message: string, trace?: string, context?: string) {
    this.logger.error(message, { context, trace });
  }
  warn(message: string, context?: string) {
    this.logger.warn(message, { context });
  }
  debug(message: string, context?: string) {
    this.logger.debug(message, { context });
  }
  verbose(message: string, context?: string) {
    this.logger.verbose(message, { context });
  }

  /** Logs `message: cause` at error level, keeping the stack when there is one. */
  failure(message: string, cause: unknown, context?: string) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const trace = cause instanceof Error ? cause.stack : undefined;
    this.logger.error(`${message}: ${detail}`, { context, trace });
  }

  /** Helper: log any object as prettified JSON at debug level */
  logJSON(obj: unknown, context?: string) {
    this.logger.debug(JSON.stringify(obj, null, 2), { context });
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { LoggerService } from '../logger/logger.service';
import { ConfigurationError, TelemetryError } from '../errors/telemetry.errors';

const SOURCE = 'telemetry | GlobalExceptionFilter';

/** HTTP status for each domain failure that can reach a controller. */
export function statusForTelemetryError(err: TelemetryError): HttpStatus {
  switch (err.kind) {
    case 'configuration':
    case 'invalid_window':
      return HttpStatus.BAD_REQUEST;
    case 'connection':
    case 'write':
    case 'query':
    case 'verification_mismatch':
      return HttpStatus.SERVICE_UNAVAILABLE;
    case 'schema_setup':
    case 'namespace_exists':
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx      = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request  = ctx.getRequest<Request>();

    // 1️⃣ normal Nest HttpException (validation pipe included)
    if (exception instanceof HttpException) {
      const status  = exception.getStatus();
      const payload = exception.getResponse();

      this.logger.error(
        JSON.stringify(payload),
        exception.stack,
        GlobalExceptionFilter.name,
      );

      return response.status(status).json({
        success    : false,
        statusCode : status,
        message    : payload,
        timestamp  : new Date().toISOString(),
        path       : request.url,
        from       : SOURCE,
      });
    }

    // 2️⃣ pipeline errors carry their own kind
    if (exception instanceof TelemetryError) {
      const status = statusForTelemetryError(exception);
      this.logger.failure(exception.name, exception, GlobalExceptionFilter.name);

      return response.status(status).json({
        success    : false,
        statusCode : status,
        message    : exception.message,
        kind       : exception.kind,
        ...(exception instanceof ConfigurationError && {
          warnings: exception.warnings,
        }),
        timestamp  : new Date().toISOString(),
        path       : request.url,
        from       : SOURCE,
      });
    }

    // 3️⃣ unhandled error / unknown throw
    this.logger.failure('Unhandled exception', exception, GlobalExceptionFilter.name);

    return response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      success    : false,
      statusCode : HttpStatus.INTERNAL_SERVER_ERROR,
      message    : `Internal Server Error`,
      timestamp  : new Date().toISOString(),
      path       : request.url,
      from       : SOURCE,
    });
  }
}

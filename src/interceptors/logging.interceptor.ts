import { Injectable, CallHandler, ExecutionContext, NestInterceptor } from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';
import { LoggerService } from '../common/logger/logger.service';

/** One line per request: method, URL, status and latency. */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: LoggerService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, originalUrl } = http.getRequest<Request>();
    const start = Date.now();

    return next.handle().pipe(
      tap(() => {
        const { statusCode } = http.getResponse<Response>();
        const ms = Date.now() - start;
        this.logger.log(`${method} ${originalUrl} ${statusCode} → ${ms} ms`, LoggingInterceptor.name);
      }),
    );
  }
}

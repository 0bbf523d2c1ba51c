// src/interceptors/response.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

/** What controllers return: `{ data, message? }`. */
export interface HandlerEnvelope<T> {
  data?: T;
  message?: string;
}

export interface ApiResponse<T> {
  status: number;
  success: boolean;
  message: string;
  data: T | null;
  from: string;
  error: null;
}

// run‑time check
export function isEnvelope<T>(obj: unknown): obj is HandlerEnvelope<T> {
  return (
    obj !== null &&
    typeof obj === 'object' &&
    ('data' in obj || 'message' in obj)
  );
}

/** Successful responses only; errors are shaped by GlobalExceptionFilter. */
@Injectable()
export class ResponseInterceptor<T>
  implements NestInterceptor<T | HandlerEnvelope<T>, ApiResponse<T>>
{
  private readonly SERVICE = 'telemetry';

  intercept(
    context: ExecutionContext,
    next: CallHandler<T | HandlerEnvelope<T>>,
  ): Observable<ApiResponse<T>> {
    const res = context.switchToHttp().getResponse<Response>();

    return next.handle().pipe(
      map((body) => {
        if (isEnvelope<T>(body)) {
          return this.wrap(res.statusCode, body.data ?? null, body.message);
        }
        return this.wrap(res.statusCode, body);
      }),
    );
  }

  private wrap(status: number, data: T | null, message?: string): ApiResponse<T> {
    return {
      status,
      success : true,
      message : message ?? 'Operation successful',
      data,
      from    : this.SERVICE,
      error   : null,
    };
  }
}

import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';

export interface CorrelatedRequest {
  correlationId?: string;
}

const HEADERS = ['x-correlation-id', 'x-corr-id'] as const;

function headerValue(request: Request, name: string): string | undefined {
  const raw = request.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value?.trim() || undefined;
}

@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request & CorrelatedRequest>();
    const response = http.getResponse<Response>();

    // Reuse the caller's id when it sent one
    const correlationId = HEADERS.map((h) => headerValue(request, h)).find(Boolean) ?? uuidv4();

    response.setHeader('x-correlation-id', correlationId);
    request.correlationId = correlationId;

    return next.handle();
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

// Renders every error as HttpExceptionResponse. Unexpected errors become 500
// and are logged with their stack; client errors are not logged.
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();

    const body = toErrorBody(exception);
    body.timestamp = new Date().toISOString();
    body.path = request.url;

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.method} ${request.url} failed: ${describe(exception)}`, stack);
    }

    response.status(body.statusCode).json(body);
  }
}

export function toErrorBody(exception: unknown): HttpExceptionResponse {
  if (!(exception instanceof HttpException)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
    };
  }

  const statusCode = exception.getStatus();
  const payload = exception.getResponse();

  if (typeof payload === 'string') {
    return { statusCode, message: payload };
  }

  // ValidationPipe and built-in exceptions answer { message, error }
  const message = 'message' in payload ? payload.message : exception.message;
  const error = 'error' in payload ? payload.error : undefined;
  return {
    statusCode,
    message: isMessage(message) ? message : exception.message,
    error: typeof error === 'string' ? error : undefined,
  };
}

function isMessage(value: unknown): value is string | string[] {
  return typeof value === 'string' || (Array.isArray(value) && value.every((item) => typeof item === 'string'));
}

function describe(exception: unknown): string {
  return exception instanceof Error ? exception.message : String(exception);
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ConfigurationError } from '../errors/configuration.error';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

// Turns every thrown value into `{ statusCode, error, timestamp, path }`.
// Unknown errors are logged with their stack but reported generically.
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = this.toErrorResponse(exception, request.url);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.method} ${request.url} -> ${body.statusCode}: ${body.error}`, stack);
    } else {
      this.logger.warn(`${request.method} ${request.url} -> ${body.statusCode}: ${body.error}`);
    }

    response.status(body.statusCode).json(body);
  }

  toErrorResponse(exception: unknown, path: string, now: Date = new Date()): HttpExceptionResponse {
    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let error = 'Internal server error';

    if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      error = exception.message;
    } else if (exception instanceof ConfigurationError) {
      error = exception.message;
    }

    return { statusCode, error, timestamp: now.toISOString(), path };
  }
}

// Import NestJS exception handling utilities
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus
} from '@nestjs/common';
// Import Express types for request/response
import type { Request, Response } from 'express';
// Import JSON logger
import { JsonLogger } from '../../logging/json-logger.service';
// Import standardized error codes
import { ERROR_CODES } from '../http/error-codes';
// Import error response body interface
import type { ErrorResponseBody } from '../http/error-response';
// Request augmentation (user, requestId)
import '../../types/express-request';

/**
 * Generic message per status code; exception messages are never echoed
 * @param statusCode - HTTP status code
 */
function safeMessageForStatus(statusCode: number): string {
  if (statusCode === HttpStatus.BAD_REQUEST) return 'Bad Request';
  if (statusCode === HttpStatus.UNAUTHORIZED) return 'Unauthorized';
  if (statusCode === HttpStatus.FORBIDDEN) return 'Forbidden';
  if (statusCode === HttpStatus.NOT_FOUND) return 'Not Found';
  return 'Internal Server Error';
}

/**
 * Map HTTP status code to application-specific error code
 * @param statusCode - HTTP status code
 */
function errorCodeForStatus(statusCode: number): ErrorResponseBody['errorCode'] {
  if (statusCode === HttpStatus.BAD_REQUEST) return ERROR_CODES.BAD_REQUEST;
  if (statusCode === HttpStatus.UNAUTHORIZED) return ERROR_CODES.UNAUTHENTICATED;
  if (statusCode === HttpStatus.FORBIDDEN) return ERROR_CODES.FORBIDDEN;
  if (statusCode === HttpStatus.NOT_FOUND) return ERROR_CODES.NOT_FOUND;
  return ERROR_CODES.INTERNAL;
}

/**
 * Request path without query string (query strings may carry secrets)
 */
function safePath(req: Request): string {
  return (req.originalUrl ?? req.url ?? '').split('?')[0] ?? '';
}

/**
 * HttpErrorFilter - Global exception filter
 * Logs every failure (5xx as error with stack, 4xx as warn) and answers with ErrorResponseBody.
 * @Catch() with no arguments catches all exception types
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(private readonly logger: JsonLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Extract status code from HttpException, default to 500 for unknown errors
    const statusCode = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const path = safePath(request);

    const meta: Record<string, unknown> = {
      requestId: request.requestId,
      method: request.method,
      path,
      statusCode
    };
    if (request.user) {
      meta.userId = request.user.userId;
      meta.userRole = request.principal?.role;
    }
    if (exception instanceof Error) {
      meta.errorName = exception.name;
      meta.errorMessage = exception.message;
      if (statusCode >= 500) meta.stack = exception.stack;
    } else {
      meta.error = String(exception);
    }

    if (statusCode >= 500) {
      this.logger.error('Unhandled exception', meta);
    } else {
      this.logger.warn('Request failed', meta);
    }

    const body: ErrorResponseBody = {
      statusCode,
      errorCode: errorCodeForStatus(statusCode),
      message: safeMessageForStatus(statusCode),
      timestamp: new Date().toISOString(),
      path,
      requestId: request.requestId
    };

    response.status(statusCode).json(body);
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { DuplicateError } from '../errors';
import { uniqueViolation } from '../sqlite-errors';

type ErrorPayload = {
  message?: string | string[];
  error?: string;
  errorCode?: string;
  details?: Record<string, unknown>;
};

const DEFAULT_ERROR_CODE = 'UNKNOWN_ERROR';

const toErrorCode = (message: string) => {
  const normalized = message
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .replace(/_+/g, '_');
  return normalized || DEFAULT_ERROR_CODE;
};

const isErrorPayload = (value: unknown): value is ErrorPayload =>
  typeof value === 'object' && value !== null;

const resolveMessage = (payload: ErrorPayload | string | undefined) => {
  if (!payload) {
    return null;
  }
  if (typeof payload === 'string') {
    return payload;
  }
  if (Array.isArray(payload.message)) {
    return payload.message.join(' ');
  }
  if (typeof payload.message === 'string') {
    return payload.message;
  }
  if (typeof payload.error === 'string') {
    return payload.error;
  }
  return null;
};

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(error: unknown, host: ArgumentsHost) {
    const violation = uniqueViolation(error);
    const exception = violation
      ? new DuplicateError(violation.field, violation.value)
      : error;
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const isHttp = exception instanceof HttpException;
    const status = isHttp
      ? exception.getStatus()
      : HttpStatus.INTERNAL_SERVER_ERROR;
    if (!isHttp) {
      this.logger.error(
        'Unhandled error',
        exception instanceof Error ? exception.stack : String(exception),
      );
    }
    const raw = isHttp ? exception.getResponse() : undefined;
    const payload =
      typeof raw === 'string' || isErrorPayload(raw) ? raw : undefined;
    const message =
      resolveMessage(payload) ||
      (exception instanceof Error ? exception.message : null) ||
      'Unexpected error.';
    const errorCode =
      typeof payload === 'object' && payload?.errorCode
        ? payload.errorCode
        : toErrorCode(message);
    const errorLabel =
      typeof payload === 'object' && payload?.error ? payload.error : undefined;
    const details =
      typeof payload === 'object' && payload?.details
        ? payload.details
        : undefined;

    response.status(status).json({
      statusCode: status,
      message,
      error: errorLabel ?? (isHttp ? undefined : 'Internal Server Error'),
      errorCode,
      ...(details ? { details } : {}),
    });
  }
}

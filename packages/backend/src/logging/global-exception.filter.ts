import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import {
  ConfigurationError,
  IntakeError,
  IntakeErrorCode,
  ProviderError,
  RetryableAgentError,
} from '../intake/intake.errors';
import { isPlainObject } from '../intake/record-patch';
import { getCorrelationId } from './correlation.middleware';
import { StructuredLoggerService } from './structured-logger.service';

/**
 * HTTP status for each intake error code
 */
export const INTAKE_ERROR_STATUS: Record<IntakeErrorCode, number> = {
  [IntakeErrorCode.CONFIGURATION_INVALID]: HttpStatus.BAD_REQUEST,
  [IntakeErrorCode.PROVIDER_FAILED]: HttpStatus.BAD_GATEWAY,
  [IntakeErrorCode.AGENT_RETRYABLE]: HttpStatus.SERVICE_UNAVAILABLE,
  [IntakeErrorCode.PATCH_INVALID]: HttpStatus.UNPROCESSABLE_ENTITY,
  [IntakeErrorCode.SESSION_CONFLICT]: HttpStatus.CONFLICT,
  [IntakeErrorCode.SESSION_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [IntakeErrorCode.FORM_NOT_FOUND]: HttpStatus.NOT_FOUND,
};

export interface ErrorResponseBody {
  statusCode: number;
  errorCode?: string;
  message: string;
  timestamp: string;
  path: string;
  details?: unknown;
  stack?: string;
}

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key', 'x-auth-token', 'x-access-token'];
const SENSITIVE_FIELDS = ['password', 'token', 'apikey', 'secret', 'credential'];
// End-user answers from the chat API
const PERSONAL_FIELDS = ['message', 'record'];

/**
 * GlobalExceptionFilter
 *
 * Maps intake errors and Nest HTTP exceptions to one JSON error shape and
 * logs each failure with the request context, sensitive values redacted.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new StructuredLoggerService().setContext('GlobalExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const error = exception instanceof Error ? exception : new Error(String(exception));
    const body = this.buildErrorResponse(error, request);

    const logContext = {
      correlationId: getCorrelationId(request),
      sessionId: this.extractSessionId(request),
      statusCode: body.statusCode,
      errorCode: body.errorCode,
      method: `${request.method} ${request.originalUrl ?? request.url}`,
      query: request.query,
      params: request.params,
      body: sanitize(request.body),
      headers: sanitizeHeaders(request.headers),
      ip: request.ip,
    };

    if (body.statusCode >= 500) {
      this.logger.error(error.message, error.stack, logContext);
    } else {
      this.logger.warn(error.message, logContext);
    }

    response.status(body.statusCode).json(body);
  }

  buildErrorResponse(error: Error, request: Pick<Request, 'url'>): ErrorResponseBody {
    const statusCode = resolveStatus(error);
    const body: ErrorResponseBody = {
      statusCode,
      message: this.getErrorMessage(error, statusCode),
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (error instanceof IntakeError) {
      body.errorCode = error.code;
    }

    if (error instanceof ConfigurationError) {
      body.details = error.problems;
    } else if (error instanceof RetryableAgentError) {
      body.details = { stage: error.stage, retryable: true };
    } else if (error instanceof ProviderError) {
      body.details = { providerCode: error.providerCode, retryable: error.retryable };
    } else if (error instanceof HttpException && statusCode === HttpStatus.BAD_REQUEST) {
      // class-validator messages from ValidationPipe
      const payload = error.getResponse();
      if (isPlainObject(payload) && Array.isArray(payload.message)) {
        body.details = payload.message;
      }
    }

    if (process.env.NODE_ENV === 'development' && error.stack) {
      body.stack = error.stack;
    }

    return body;
  }

  private getErrorMessage(error: Error, status: number): string {
    if (error instanceof HttpException) {
      const payload = error.getResponse();
      if (typeof payload === 'string') {
        return payload;
      }
      if (isPlainObject(payload) && 'message' in payload) {
        return Array.isArray(payload.message) ? payload.message.join(', ') : String(payload.message);
      }
    }

    // Intake errors carry messages meant for clients
    if (status >= 500 && !(error instanceof IntakeError) && process.env.NODE_ENV === 'production') {
      return 'An internal server error occurred';
    }

    return error.message || 'An unexpected error occurred';
  }

  private extractSessionId(request: Request): string | undefined {
    if (request.params?.sessionId) {
      return request.params.sessionId;
    }
    const body: unknown = request.body;
    if (isPlainObject(body) && typeof body.sessionId === 'string') {
      return body.sessionId;
    }
    return undefined;
  }
}

export function resolveStatus(error: unknown): number {
  if (error instanceof IntakeError) {
    return INTAKE_ERROR_STATUS[error.code];
  }
  if (error instanceof HttpException) {
    return error.getStatus();
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

function sanitizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      sanitized[key] = value;
    } else if (Array.isArray(value)) {
      sanitized[key] = value.join(', ');
    }
  }

  return sanitized;
}

/**
 * Copy of a request body with secrets and end-user answers redacted
 */
export function sanitize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sanitize);
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    const redact = [...SENSITIVE_FIELDS, ...PERSONAL_FIELDS].some((field) => lowerKey.includes(field));
    result[key] = redact ? '[REDACTED]' : sanitize(entry);
  }
  return result;
}

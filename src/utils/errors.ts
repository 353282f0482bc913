// Standardized HTTP error handling
// Every route failure leaves the API in the same { error, message, statusCode } shape

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

export enum ErrorCode {
  BAD_REQUEST = 'bad_request',
  VALIDATION_ERROR = 'validation_error',
  TIMEOUT = 'timeout',
  INTERNAL_ERROR = 'internal_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static timeout(message: string = 'Request timed out'): AppError {
    return new AppError(ErrorCode.TIMEOUT, message, 504);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toAppError(error: FastifyError | Error): AppError {
  if (error instanceof AppError) return error;

  if (error instanceof ZodError) {
    return AppError.validationError(
      'Invalid request',
      error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }

  // Fastify's own 4xx errors (malformed JSON, unsupported media type)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return AppError.badRequest(error.message);
  }

  return AppError.internal();
}

export function handleRouteError(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  const appError = toAppError(error);

  if (appError.code === ErrorCode.TIMEOUT) {
    request.log.info({ message: appError.message }, 'Request cancelled');
  } else if (appError.statusCode >= 500) {
    request.log.error({ err: error }, 'Unhandled route error');
  }

  return reply
    .code(appError.statusCode)
    .send(formatErrorResponse(appError, appError.code === ErrorCode.VALIDATION_ERROR));
}

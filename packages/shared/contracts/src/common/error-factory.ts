/**
 * Structured Error Factory
 *
 * Creates consistent error responses that preserve error details across service boundaries.
 * Use this factory in all controllers to ensure meaningful error messages reach the client.
 */

import type { Response } from 'express';
import type { ServiceError } from './index.js';

export type ErrorCode =
  | 'UNKNOWN'
  | 'VALIDATION_ERROR'
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'TIMEOUT'
  | 'PAYLOAD_TOO_LARGE'
  | 'SERVICE_UNAVAILABLE'
  | 'DATABASE_ERROR'
  | 'INTERNAL_ERROR';

export type ErrorType =
  | 'ValidationError'
  | 'NotFoundError'
  | 'ConflictError'
  | 'TimeoutError'
  | 'ServiceUnavailableError'
  | 'DatabaseError'
  | 'InternalError';

export interface StructuredError {
  type: ErrorType;
  /** One of {@link ErrorCode}, or a service-specific code carried by a domain error */
  code: string;
  message: string;
  details?: Record<string, unknown>;
  originalError?: string;
  stack?: string;
  service?: string;
  correlationId?: string;
}

interface StructuredErrorOptions {
  details?: Record<string, unknown>;
  originalError?: unknown;
  service?: string;
  correlationId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Extract meaningful error information from any error type
 * Handles DrizzleQueryError which stores the actual DB error in .cause
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  originalError: string;
  stack?: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof Error) {
    const { cause } = error;
    let actualMessage = error.message;
    let causeMessage: string | undefined;

    if (cause instanceof Error) {
      causeMessage = cause.message;
      // "Failed query" wrappers hide the driver message in the cause
      if (error.message.startsWith('Failed query:')) {
        actualMessage = cause.message || error.message;
      }
    }

    // PostgreSQL fields live on the driver error that drizzle wraps
    const pgDetails: Record<string, unknown> = {};
    if (cause instanceof Error) {
      const pgFields = ['code', 'detail', 'hint', 'table', 'column'] as const;
      for (const field of pgFields) {
        const value = readString(cause, field);
        if (value) pgDetails[`pg${field[0].toUpperCase()}${field.slice(1)}`] = value;
      }
    }
    if (causeMessage) pgDetails.causeMessage = causeMessage;

    const ownDetails: unknown = Reflect.get(error, 'details');
    const existingDetails = isRecord(ownDetails) ? ownDetails : undefined;

    return {
      message: actualMessage,
      originalError: causeMessage ? `${error.message} | Cause: ${causeMessage}` : error.message,
      stack: process.env.NODE_ENV !== 'production' ? error.stack : undefined,
      details: Object.keys(pgDetails).length > 0 ? { ...existingDetails, ...pgDetails } : existingDetails,
    };
  }

  if (typeof error === 'string') {
    return {
      message: error,
      originalError: error,
    };
  }

  if (isRecord(error)) {
    return {
      message: String(error.message || error.error || 'Unknown error'),
      originalError: JSON.stringify(error),
      details: isRecord(error.details) ? error.details : undefined,
    };
  }

  return {
    message: 'Unknown error occurred',
    originalError: String(error),
  };
}

/**
 * Create a structured error response
 */
export function createStructuredError(
  code: string,
  type: ErrorType,
  message: string,
  options?: StructuredErrorOptions
): StructuredError {
  const result: StructuredError = {
    type,
    code,
    message,
  };

  if (options?.details) {
    result.details = options.details;
  }

  if (options?.originalError) {
    const errorInfo = extractErrorInfo(options.originalError);
    result.originalError = errorInfo.originalError;
    if (errorInfo.stack) {
      result.stack = errorInfo.stack;
    }
    if (errorInfo.details && !result.details) {
      result.details = errorInfo.details;
    }
  }

  if (options?.service) {
    result.service = options.service;
  }

  if (options?.correlationId) {
    result.correlationId = options.correlationId;
  }

  return result;
}

/**
 * Send a structured error response
 */
export function sendStructuredError(res: Response, statusCode: number, error: StructuredError): void {
  const extraDetails: Record<string, unknown> = {};
  if (error.originalError) extraDetails.originalError = error.originalError;
  if (error.service) extraDetails.service = error.service;

  const hasDetails = error.details || Object.keys(extraDetails).length > 0;

  const responseError: ServiceError & { stack?: string } = {
    type: error.type,
    code: error.code,
    message: error.message,
    ...(hasDetails && { details: { ...error.details, ...extraDetails } }),
    correlationId: error.correlationId,
    ...(error.stack && { stack: error.stack }),
  };

  res.status(statusCode).json({
    success: false,
    error: responseError,
    timestamp: new Date().toISOString(),
  });
}

function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600 ? statusCode : undefined;
}

/**
 * Structured Error Factory
 * Use these methods in controllers to create consistent error responses
 */
export const StructuredErrors = {
  /**
   * Validation error (400) - for invalid input
   */
  validation: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 400, createStructuredError('VALIDATION_ERROR', 'ValidationError', message, options));
  },

  /**
   * Service unavailable error (503) - for dependency or subsystem unavailability
   */
  serviceUnavailable: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(
      res,
      503,
      createStructuredError('SERVICE_UNAVAILABLE', 'ServiceUnavailableError', message, options)
    );
  },

  /**
   * Create error from caught exception
   * Typed errors (DomainError with statusCode) keep their status and code; anything else is a 500
   */
  fromException: (
    res: Response,
    error: unknown,
    fallbackMessage: string,
    options?: { service?: string; correlationId?: string }
  ) => {
    const errorInfo = extractErrorInfo(error);
    const message = errorInfo.message || fallbackMessage;
    const statusCode = readStatusCode(error) ?? 500;
    const ownCode = typeof error === 'object' && error !== null ? readString(error, 'code') : undefined;

    sendStructuredError(
      res,
      statusCode,
      createStructuredError(ownCode ?? statusCodeToErrorCode(statusCode), statusCodeToErrorType(statusCode), message, {
        originalError: error,
        details: errorInfo.details,
        ...options,
      })
    );
  },
};

export function statusCodeToErrorCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
    case 422:
      return 'VALIDATION_ERROR';
    case 404:
      return 'NOT_FOUND';
    case 408:
    case 504:
      return 'TIMEOUT';
    case 409:
      return 'CONFLICT';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return 'INTERNAL_ERROR';
  }
}

export function statusCodeToErrorType(statusCode: number): ErrorType {
  switch (statusCode) {
    case 400:
    case 422:
      return 'ValidationError';
    case 404:
      return 'NotFoundError';
    case 408:
    case 504:
      return 'TimeoutError';
    case 409:
      return 'ConflictError';
    case 503:
      return 'ServiceUnavailableError';
    default:
      return 'InternalError';
  }
}

/**
 * Helper to get correlation ID from request headers
 */
export function getCorrelationId(req: { headers: Record<string, string | string[] | undefined> }): string | undefined {
  const header = req.headers['x-correlation-id'] ?? req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

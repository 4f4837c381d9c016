import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { statusCodeToErrorCode, statusCodeToErrorType, sendStructuredError } from '@netkpi/shared-contracts';
import { getLogger } from '../logging';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  TIMEOUT = 'TIMEOUT',
  DATABASE_ERROR = 'DATABASE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

/**
 * Build a service error class whose codes extend {@link DomainErrorCode}.
 * Subclass the result to add service-specific factories.
 */
export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: Record<keyof typeof DomainErrorCode, T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error, details?: Record<string, unknown>) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

function resolveCorrelationId(req: Request): string | undefined {
  const header = req.headers['x-correlation-id'] ?? req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  options?: {
    code?: string;
    details?: Record<string, unknown>;
    correlationId?: string;
    stack?: string;
  }
): void {
  const isDevelopment = process.env.NODE_ENV !== 'production';

  sendStructuredError(res, statusCode, {
    type: statusCodeToErrorType(statusCode),
    code: options?.code || statusCodeToErrorCode(statusCode),
    message,
    details: options?.details,
    correlationId: options?.correlationId,
    stack: isDevelopment ? options?.stack : undefined,
  });
}

function readHttpStatus(error: Error): number {
  const status: unknown = Reflect.get(error, 'statusCode') ?? Reflect.get(error, 'status');
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

/**
 * Terminal express error middleware: DomainErrors keep their status and code,
 * zod failures become 400 VALIDATION_ERROR, anything else is a 500.
 */
export function errorHandler() {
  return (error: Error, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) return next(error);

    const correlationId = resolveCorrelationId(req);

    if (error instanceof DomainError) {
      const statusCode = error.statusCode;
      const code = error.code || statusCodeToErrorCode(statusCode);
      middlewareLogger.log(statusCode >= 500 ? 'error' : 'warn', 'DomainError caught', {
        error: error.message,
        statusCode,
        code,
        correlationId,
        url: req.originalUrl,
        method: req.method,
      });

      sendErrorResponse(res, statusCode, error.message, {
        code,
        details: error.details,
        correlationId,
        stack: error.stack,
      });
      return;
    }

    if (error instanceof ZodError) {
      sendErrorResponse(res, 400, 'Validation failed', {
        code: 'VALIDATION_ERROR',
        correlationId,
        details: { issues: error.issues },
      });
      return;
    }

    const statusCode = readHttpStatus(error);
    const message =
      process.env.NODE_ENV === 'production' && statusCode >= 500
        ? 'Internal Server Error'
        : error.message || 'Unknown error occurred';

    middlewareLogger.error('Unhandled error', {
      error: error.message,
      stack: error.stack,
      correlationId,
      url: req.originalUrl,
      method: req.method,
    });

    sendErrorResponse(res, statusCode, message, { correlationId, stack: error.stack });
  };
}

export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}

type ShutdownHook = () => Promise<void>;

/**
 * Process-wide handlers for uncaught errors and termination signals.
 * Registered once; later calls only add shutdown hooks.
 */
export class ErrorHandlerManager {
  private static instance: ErrorHandlerManager | undefined;
  private readonly logger = getLogger('error-handler-manager');
  private isInitialized = false;
  private readonly shutdownHooks: ShutdownHook[] = [];

  private constructor() {}

  public static getInstance(): ErrorHandlerManager {
    if (!ErrorHandlerManager.instance) {
      ErrorHandlerManager.instance = new ErrorHandlerManager();
    }
    return ErrorHandlerManager.instance;
  }

  public registerGlobalHandlers(source: string): void {
    if (this.isInitialized) {
      this.logger.debug(`Global error handlers already registered, ignoring duplicate call from: ${source}`);
      return;
    }

    process.on('uncaughtException', (error: Error) => {
      this.logger.error('Uncaught Exception:', { error: error.message, stack: error.stack, source });
      if (process.env.NODE_ENV === 'production') {
        process.exit(1);
      }
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled Promise Rejection:', {
        reason: errorMessage(reason),
        stack: errorStack(reason),
        source,
      });
    });

    process.on('SIGINT', () => this.gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => this.gracefulShutdown('SIGTERM'));

    this.isInitialized = true;
    this.logger.debug('Global error handlers registered', { source });
  }

  public registerShutdownHook(hook: ShutdownHook): void {
    this.shutdownHooks.push(hook);
  }

  private gracefulShutdown(signal: string): void {
    this.logger.info(`Starting graceful shutdown (${signal})...`);

    const forceExitTimeout = setTimeout(() => {
      this.logger.warn('Shutdown hooks timed out, forcing exit');
      process.exit(1);
    }, 10000);
    forceExitTimeout.unref();

    const runHooksAndExit = async () => {
      for (const hook of this.shutdownHooks) {
        try {
          await hook();
        } catch (error) {
          this.logger.error('Shutdown hook error', { error: errorMessage(error) });
        }
      }
      this.logger.info('Graceful shutdown completed');
      process.exit(0);
    };

    void runHooksAndExit();
  }
}

export function registerGlobalErrorHandlers(source: string): void {
  ErrorHandlerManager.getInstance().registerGlobalHandlers(source);
}

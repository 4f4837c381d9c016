/**
 * Logging Middleware
 *
 * Express middleware for request logging with correlation
 */

import { Request, Response, NextFunction } from 'express';
import { LogContext } from './types';
import { getLogger } from './logger';
import { correlationStorage, generateCorrelationId } from './correlation';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Express middleware for request logging with correlation ID
 */
export function requestLogger(serviceName: string) {
  const logger = getLogger(serviceName);

  return (req: Request, res: Response, next: NextFunction) => {
    const correlationId =
      headerValue(req.headers['x-correlation-id']) ?? headerValue(req.headers['x-request-id']) ?? generateCorrelationId();
    const startedAt = Date.now();

    const context: LogContext = {
      correlationId,
      service: serviceName,
      method: req.method,
      url: req.originalUrl,
    };

    res.setHeader('x-correlation-id', correlationId);
    res.on('finish', () => {
      logger.debug('Request completed', {
        ...context,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });

    correlationStorage.run(context, () => {
      next();
    });
  };
}

/**
 * Shared Response Helpers for netkpi services
 *
 * Factory functions to create service-specific response helpers with consistent
 * response formats matching the ServiceResponse<T> contract from @netkpi/shared-contracts.
 *
 * Usage:
 *   import { createResponseHelpers } from '@netkpi/platform-core';
 *   const { sendSuccess, ServiceErrors } = createResponseHelpers('kpi-service');
 */

import { Response } from 'express';
import { StructuredErrors, getCorrelationId, type ServiceResponse } from '@netkpi/shared-contracts';

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string, req?: RequestWithHeaders) => void;

  serviceUnavailable: (res: Response, message: string, req?: RequestWithHeaders) => void;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, statusCode?: number) => void;
  ServiceErrors: ServiceErrorHelpers;
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  const context = (req?: RequestWithHeaders) => ({
    service: serviceName,
    correlationId: req ? getCorrelationId(req) : undefined,
  });

  return {
    fromException: (res, error, fallbackMessage, req) => {
      StructuredErrors.fromException(res, error, fallbackMessage, context(req));
    },

    serviceUnavailable: (res, message, req) => {
      StructuredErrors.serviceUnavailable(res, message || 'Service unavailable', context(req));
    },
  };
}

function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  const body: ServiceResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(body);
}

/**
 * Create response helpers for a specific service
 *
 * @example
 * ```typescript
 * const { sendSuccess, ServiceErrors } = createResponseHelpers('kpi-service');
 *
 * async getThresholds(req: Request, res: Response) {
 *   try {
 *     sendSuccess(res, this.reports.getThresholds());
 *   } catch (error) {
 *     ServiceErrors.fromException(res, error, 'Failed to get thresholds', req);
 *   }
 * }
 * ```
 */
export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess,
    ServiceErrors: createServiceErrors(serviceName),
  };
}

let serviceHelpers: ResponseHelpers | null = null;

export function initResponseHelpers(serviceName: string): ResponseHelpers {
  serviceHelpers = createResponseHelpers(serviceName);
  return serviceHelpers;
}

function resolve(): ResponseHelpers {
  if (!serviceHelpers) {
    throw new Error('Response helpers not initialized. Call initResponseHelpers(serviceName) during service bootstrap.');
  }
  return serviceHelpers;
}

/**
 * Helpers bound lazily to whatever {@link initResponseHelpers} registered,
 * so controllers can grab them at module load before bootstrap runs.
 */
export function getResponseHelpers(): ResponseHelpers {
  return {
    sendSuccess: (res, data, statusCode) => resolve().sendSuccess(res, data, statusCode),
    ServiceErrors: {
      fromException: (...args) => resolve().ServiceErrors.fromException(...args),
      serviceUnavailable: (...args) => resolve().ServiceErrors.serviceUnavailable(...args),
    },
  };
}

/**
 * Common Contracts
 *
 * Shared types for common patterns across all services:
 * - API response wrappers
 * - Error structures
 */

import { z } from 'zod';

export const ServiceErrorSchema = z.object({
  type: z.string(),
  code: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
  correlationId: z.string().optional(),
});
export type ServiceError = z.infer<typeof ServiceErrorSchema>;

export const ServiceResponseSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    success: z.boolean(),
    data: dataSchema.optional(),
    error: ServiceErrorSchema.optional(),
    timestamp: z.string().optional(),
  });

export type ServiceResponse<T> = {
  success: boolean;
  data?: T;
  error?: ServiceError;
  timestamp?: string;
};

// Re-export error factory utilities
export * from './error-factory.js';

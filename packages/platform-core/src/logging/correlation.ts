/**
 * Correlation Context
 *
 * Async correlation ID management across requests
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { LogContext } from './types';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function generateCorrelationId(): string {
  return randomUUID();
}

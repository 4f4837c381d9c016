/**
 * Health Check Utilities
 *
 * Helper functions for health checking
 */

import type { ComponentHealth, HealthResponse, HealthState } from './types';

const SEVERITY: Record<HealthState, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

/**
 * Overall status is the worst component status
 */
export function aggregateHealth(components: Record<string, ComponentHealth>): HealthState {
  return Object.values(components).reduce<HealthState>(
    (worst, component) => (SEVERITY[component.status] > SEVERITY[worst] ? component.status : worst),
    'healthy'
  );
}

export function createHealthResponse(
  serviceName: string,
  components: Record<string, ComponentHealth>,
  version = process.env.npm_package_version
): HealthResponse {
  return {
    service: serviceName,
    status: aggregateHealth(components),
    timestamp: new Date().toISOString(),
    version,
    uptime: process.uptime(),
    components,
  };
}

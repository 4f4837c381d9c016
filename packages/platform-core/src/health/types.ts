/**
 * Health Check Types
 *
 * Interfaces and types for health checking functionality
 */

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthState;
  responseTimeMs?: number;
  errorMessage?: string;
  metadata?: Record<string, unknown>;
}

export interface HealthResponse {
  service: string;
  status: HealthState;
  timestamp: string;
  version?: string;
  uptime: number;
  components: Record<string, ComponentHealth>;
}

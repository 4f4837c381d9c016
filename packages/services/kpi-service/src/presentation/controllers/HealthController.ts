/**
 * Health Controller - Kubernetes-compatible health probes
 * Handles /health, /health/live, /health/ready, /health/startup
 */

import type { Request, Response } from 'express';
import { createHealthResponse, errorMessage, getResponseHelpers, type ComponentHealth } from '@netkpi/platform-core';
import type { SnapshotStatus } from '../../application/services';
import type { KpiServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../../config/service-urls';

const { ServiceErrors } = getResponseHelpers();

function snapshotHealth(status: SnapshotStatus): ComponentHealth {
  switch (status.state) {
    case 'ready':
      return { status: 'healthy', metadata: { loadedAt: status.loadedAt, records: status.records, sites: status.sites } };
    case 'failed':
      return { status: 'unhealthy', errorMessage: status.error };
    default:
      return { status: 'degraded', metadata: { state: status.state } };
  }
}

export class HealthController {
  constructor(private readonly registry: Pick<KpiServiceRegistry, 'snapshots'>) {}

  getHealth(_req: Request, res: Response): void {
    const health = createHealthResponse(SERVICE_NAME, {
      counterSnapshot: snapshotHealth(this.registry.snapshots.status()),
    });
    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  }

  getLiveness(_req: Request, res: Response): void {
    res.status(200).json({
      alive: true,
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  /**
   * Ready once the counter snapshot is loaded; the first probe triggers the load
   */
  async getReadiness(req: Request, res: Response): Promise<void> {
    try {
      const snapshot = await this.registry.snapshots.getSnapshot();
      res.status(200).json({
        ready: true,
        service: SERVICE_NAME,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        components: {
          counterSnapshot: { healthy: true, records: snapshot.records.length, sites: snapshot.sites.length },
        },
      });
    } catch (error) {
      ServiceErrors.serviceUnavailable(res, errorMessage(error), req);
    }
  }

  getStartup(_req: Request, res: Response): void {
    res.status(200).json({
      started: true,
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }
}

/**
 * kpi-service - Route Aggregator
 * Combines all route modules and mounts them on the Express app.
 */

import type { Express } from 'express';
import { getResponseHelpers } from '@netkpi/platform-core';
import type { KpiServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../../config/service-urls';
import { createHealthRoutes } from './health.routes';
import { createKpiRoutes } from './kpi.routes';

const { sendSuccess } = getResponseHelpers();

export function setupRoutes(app: Express, registry: KpiServiceRegistry): void {
  app.use('/', createHealthRoutes(registry));
  app.use('/', createKpiRoutes(registry));

  // Root endpoint
  app.get('/', (_req, res) => {
    sendSuccess(res, {
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0',
      status: 'running',
      endpoints: {
        health: '/health',
        thresholds: '/api/kpi/thresholds',
        clusters: '/api/kpi/clusters',
        overview: '/api/kpi/overview',
        siteDaily: '/api/kpi/sites/daily',
        siteMap: '/api/kpi/sites/map',
        clusterReport: '/api/kpi/clusters/report',
      },
    });
  });
}

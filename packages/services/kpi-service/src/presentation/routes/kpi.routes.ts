/**
 * KPI Routes
 * GET /api/kpi/thresholds, /api/kpi/clusters, /api/kpi/overview, /api/kpi/sites/daily,
 * /api/kpi/sites/map, /api/kpi/clusters/report; POST /api/kpi/reload
 */

import { Router } from 'express';
import { KpiController } from '../controllers/KpiController';
import type { KpiServiceRegistry } from '../../infrastructure/ServiceFactory';

export function createKpiRoutes(registry: KpiServiceRegistry): Router {
  const router = Router();
  const controller = new KpiController(registry);

  router.get('/api/kpi/thresholds', (req, res) => controller.getThresholds(req, res));
  router.get('/api/kpi/clusters', (req, res) => controller.getClusters(req, res));
  router.get('/api/kpi/clusters/report', (req, res) => controller.getClusterReport(req, res));
  router.get('/api/kpi/overview', (req, res) => controller.getOverview(req, res));
  router.get('/api/kpi/sites/daily', (req, res) => controller.getSiteDaily(req, res));
  router.get('/api/kpi/sites/map', (req, res) => controller.getSiteMap(req, res));
  router.post('/api/kpi/reload', (req, res) => controller.reload(req, res));

  return router;
}

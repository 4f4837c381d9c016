/**
 * KPI Controller
 * Report endpoints over the counter snapshot: overview, per-site daily, site map,
 * cluster report, reference data and snapshot reload.
 */

import type { Request, Response } from 'express';
import { createValidation, getResponseHelpers, serializeError } from '@netkpi/platform-core';
import { KpiQuerySchema, type KpiQuery } from '@netkpi/shared-contracts';
import type { ReportSelection } from '../../application/services';
import type { KpiServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME, getLogger } from '../../config/service-urls';

const { sendSuccess, ServiceErrors } = getResponseHelpers();
const { parseQuery } = createValidation(SERVICE_NAME);
const logger = getLogger('kpi-service:kpi-controller');

function toSelection(query: KpiQuery): ReportSelection {
  return { from: query.from, to: query.to, sites: query.sites, siteNames: query.siteNames };
}

export class KpiController {
  constructor(private readonly registry: Pick<KpiServiceRegistry, 'reports'>) {}

  getThresholds(req: Request, res: Response): void {
    try {
      sendSuccess(res, this.registry.reports.getThresholds());
    } catch (error) {
      logger.error('Failed to get thresholds', { error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to get thresholds', req);
    }
  }

  getClusters(req: Request, res: Response): void {
    try {
      sendSuccess(res, this.registry.reports.getClusters());
    } catch (error) {
      logger.error('Failed to get clusters', { error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to get clusters', req);
    }
  }

  async getOverview(req: Request, res: Response): Promise<void> {
    const query = parseQuery(KpiQuerySchema, req, res);
    if (!query) return;

    try {
      sendSuccess(res, await this.registry.reports.getOverview(toSelection(query)));
    } catch (error) {
      logger.error('Failed to build overview', { error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to build overview', req);
    }
  }

  async getSiteDaily(req: Request, res: Response): Promise<void> {
    const query = parseQuery(KpiQuerySchema, req, res);
    if (!query) return;

    try {
      sendSuccess(res, await this.registry.reports.getSiteDaily(toSelection(query)));
    } catch (error) {
      logger.error('Failed to build site daily report', { error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to build site daily report', req);
    }
  }

  async getSiteMap(req: Request, res: Response): Promise<void> {
    const query = parseQuery(KpiQuerySchema, req, res);
    if (!query) return;

    try {
      sendSuccess(res, await this.registry.reports.getSiteMap(toSelection(query), query.kpi, query.clusters));
    } catch (error) {
      logger.error('Failed to build site map', { error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to build site map', req);
    }
  }

  async getClusterReport(req: Request, res: Response): Promise<void> {
    const query = parseQuery(KpiQuerySchema, req, res);
    if (!query) return;

    try {
      sendSuccess(res, await this.registry.reports.getClusterReport(toSelection(query), query.clusters));
    } catch (error) {
      logger.error('Failed to build cluster report', { error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to build cluster report', req);
    }
  }

  async reload(req: Request, res: Response): Promise<void> {
    try {
      sendSuccess(res, await this.registry.reports.reload());
    } catch (error) {
      logger.error('Failed to reload counter snapshot', { error: serializeError(error) });
      ServiceErrors.fromException(res, error, 'Failed to reload counter snapshot', req);
    }
  }
}

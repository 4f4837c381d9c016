import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_KPI_THRESHOLDS } from '@netkpi/shared-contracts';

vi.mock('../config/service-urls', async () => {
  const { createMockLogger } = await import('@netkpi/test-utils');
  return { SERVICE_NAME: 'kpi-service', getLogger: () => createMockLogger() };
});

import { createServiceRegistry } from '../infrastructure/ServiceFactory';
import { InMemoryCounterStoreRepository } from '../infrastructure/repositories/InMemoryCounterStoreRepository';
import type { KpiReportService } from '../application/services';
import { KpiErrorCode } from '../application/errors';
import { counterRecord, siteRecord, TEST_CONFIG } from './fixtures';

const records = [
  counterRecord('2024-01-01', 12, { SAMPLES_CELL_AVAIL: 950, DENOM_CELL_AVAIL: 1000 }),
  counterRecord('2024-01-02', 7, { SAMPLES_CELL_AVAIL: 995, DENOM_CELL_AVAIL: 1000 }),
  counterRecord('2024-01-01', 99, { SAMPLES_CELL_AVAIL: 500, DENOM_CELL_AVAIL: 1000 }),
];
const sites = [siteRecord(12, 'Escazu'), siteRecord(7, 'Grecia')];

describe('KpiReportService', () => {
  let repository: InMemoryCounterStoreRepository;
  let reports: KpiReportService;

  beforeEach(() => {
    repository = new InMemoryCounterStoreRepository(records, sites);
    reports = createServiceRegistry({ config: TEST_CONFIG, repository }).reports;
  });

  describe('getOverview', () => {
    it('should total the network and list sites in id order', async () => {
      const overview = await reports.getOverview();

      expect(overview.range).toEqual({ from: '2024-01-01', to: '2024-01-02' });
      expect(overview.total?.rowCount).toBe(3);
      expect(overview.total?.kpis.availability).toBeCloseTo(81.5, 10);
      expect(overview.total?.status.availability).toBe('Red');
      expect(overview.sites.map(row => [row.group.siteId, row.siteName])).toEqual([
        ['7', 'Grecia'],
        ['12', 'Escazu'],
        ['99', 'Sin Nombre Site'],
      ]);
    });

    it('should derive daily network values from summed counters', async () => {
      const overview = await reports.getOverview();

      expect(overview.daily.map(row => row.group.date)).toEqual(['2024-01-01', '2024-01-02']);
      expect(overview.daily[0]?.kpis.availability).toBeCloseTo(72.5, 10);
      expect(overview.daily[1]?.status.availability).toBe('Green');
    });

    it('should filter by date range', async () => {
      const overview = await reports.getOverview({ from: '2024-01-02', to: '2024-01-02' });

      expect(overview.range).toEqual({ from: '2024-01-02', to: '2024-01-02' });
      expect(overview.sites.map(row => row.group.siteId)).toEqual(['7']);
    });

    it('should select sites by name', async () => {
      const overview = await reports.getOverview({ siteNames: ['Grecia'] });
      expect(overview.sites.map(row => row.siteName)).toEqual(['Grecia']);
    });

    it('should return no total for an empty selection', async () => {
      const overview = await reports.getOverview({ sites: [] });

      expect(overview.total).toBeNull();
      expect(overview.daily).toEqual([]);
      expect(overview.range).toEqual({ from: null, to: null });
    });
  });

  describe('getSiteDaily', () => {
    it('should return one named row per site and day', async () => {
      const rows = await reports.getSiteDaily();

      expect(rows.map(row => row.group)).toEqual([
        { date: '2024-01-01', siteId: '12', siteName: 'Escazu' },
        { date: '2024-01-01', siteId: '99', siteName: 'Sin Nombre Site' },
        { date: '2024-01-02', siteId: '7', siteName: 'Grecia' },
      ]);
    });
  });

  describe('getSiteMap', () => {
    it('should classify the selected site and place only it on the map', async () => {
      const map = await reports.getSiteMap({ sites: ['12'] });

      expect(map.kpi).toBe('availability');
      expect(map.thresholds).toEqual({ green: 99, red: 90 });
      expect(map.sites).toHaveLength(1);
      expect(map.sites[0]?.status).toBe('Yellow');
      expect(map.points.map(point => [point.siteId, point.status])).toEqual([['12', 'Yellow']]);
    });

    it('should classify another KPI when asked', async () => {
      const map = await reports.getSiteMap({}, 'retainabilityTechnical');

      expect(map.kpi).toBe('retainabilityTechnical');
      expect(map.sites.map(row => row.value)).toEqual([0, 0, 0]);
      expect(map.sites.every(row => row.status === 'Red')).toBe(true);
    });

    it('should map only the member sites of the requested clusters', async () => {
      const map = await reports.getSiteMap({}, 'availability', ['Alajuela']);

      expect(map.clusters).toEqual(['Alajuela']);
      expect(map.sites.map(row => [row.group.siteId, row.status])).toEqual([
        ['7', 'Green'],
        ['12', 'Yellow'],
      ]);
      expect(map.points.map(point => [point.siteId, point.value, point.status])).toEqual([
        ['12', 95, 'Yellow'],
        ['7', 99.5, 'Green'],
      ]);
    });

    it('should intersect a cluster with an explicit site selection', async () => {
      const map = await reports.getSiteMap({ sites: ['99', '12'] }, 'availability', ['Alajuela']);

      expect(map.sites.map(row => row.group.siteId)).toEqual(['12']);
      expect(map.points.map(point => point.siteId)).toEqual(['12']);
    });

    it('should return an empty map for a cluster without records or coordinates', async () => {
      const map = await reports.getSiteMap({}, 'availability', ['Zona Sur']);

      expect(map.clusters).toEqual(['Zona Sur']);
      expect(map.sites).toEqual([]);
      expect(map.points).toEqual([]);
    });

    it('should map the whole network when no cluster is given', async () => {
      const map = await reports.getSiteMap();
      expect(map.clusters).toEqual([]);
    });

    it('should reject unknown clusters', async () => {
      await expect(reports.getSiteMap({}, 'availability', ['Limon'])).rejects.toMatchObject({
        code: KpiErrorCode.UNKNOWN_CLUSTER,
      });
    });
  });

  describe('getClusterReport', () => {
    it('should aggregate the requested cluster per day and in total', async () => {
      const report = await reports.getClusterReport({}, ['Alajuela']);

      expect(report.clusters).toEqual(['Alajuela']);
      expect(report.daily.map(row => row.group)).toEqual([
        { cluster: 'Alajuela', date: '2024-01-01' },
        { cluster: 'Alajuela', date: '2024-01-02' },
      ]);
      expect(report.totals).toHaveLength(1);
      expect(report.totals[0]?.kpis.availability).toBeCloseTo(97.25, 10);
      expect(report.totals[0]?.status.availability).toBe('Yellow');
    });

    it('should cover every cluster by default and leave out clusters without records', async () => {
      const report = await reports.getClusterReport();

      expect(report.clusters).toEqual(['Zona Sur', 'Alajuela', 'San Ramon', 'Cartago', 'Atlántico']);
      expect(report.totals.map(row => row.group.cluster)).toEqual(['Alajuela']);
    });

    it('should report a cluster named twice only once', async () => {
      const report = await reports.getClusterReport({}, ['Alajuela', 'Alajuela']);

      expect(report.clusters).toEqual(['Alajuela']);
      expect(report.daily).toHaveLength(2);
      expect(report.totals).toHaveLength(1);
    });

    it('should reject unknown clusters', async () => {
      await expect(reports.getClusterReport({}, ['Limon'])).rejects.toMatchObject({
        code: KpiErrorCode.UNKNOWN_CLUSTER,
        statusCode: 404,
      });
    });
  });

  describe('getThresholds', () => {
    it('should expose the table with display metadata', () => {
      const report = reports.getThresholds();

      expect(report.thresholds).toEqual(DEFAULT_KPI_THRESHOLDS);
      expect(report.statusOrder).toEqual(['Red', 'Yellow', 'Green']);
      expect(report.labels.Yellow).toBe('Amarillo');
      expect(report.kpiLabels.retainabilityUser).toBe('Retainability (user)');
    });
  });

  describe('getClusters', () => {
    it('should list the definition with a clean validation', () => {
      const report = reports.getClusters();

      expect(report.clusters).toHaveLength(5);
      expect(report.clusters[4]).toEqual({ name: 'Atlántico', siteIds: [38, 39, 40, 41, 42, 43, 44, 45] });
      expect(report.validation).toEqual({ overlaps: [], gaps: [], outsideUniverse: [] });
    });
  });

  describe('reload', () => {
    it('should report the reloaded snapshot', async () => {
      await reports.getOverview();
      repository.replace(records.slice(0, 1));

      const result = await reports.reload();

      expect(result).toMatchObject({ records: 1, sites: 2 });
      expect((await reports.getOverview()).sites).toHaveLength(1);
    });
  });
});

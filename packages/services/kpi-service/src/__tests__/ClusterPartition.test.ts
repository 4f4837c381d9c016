import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
}));

vi.mock('../config/service-urls', () => ({
  SERVICE_NAME: 'kpi-service',
  getLogger: () => mockLogger,
}));

import { ClusterPartition } from '../application/kpi/ClusterPartition';
import { KpiErrorCode } from '../application/errors';
import { DEFAULT_CLUSTER_DEFINITION } from '../config/kpi-config';
import { toSiteId } from '../domains/entities';
import { captureError } from './fixtures';

describe('ClusterPartition', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('default definition', () => {
    const partition = new ClusterPartition(DEFAULT_CLUSTER_DEFINITION);

    it('should list clusters in definition order', () => {
      expect(partition.names()).toEqual(['Zona Sur', 'Alajuela', 'San Ramon', 'Cartago', 'Atlántico']);
    });

    it('should return ordered members', () => {
      expect(partition.members('Alajuela')).toEqual([7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17]);
      expect(partition.members('San Ramon')).toEqual([18, 19, 20, 21, 22, 48, 49]);
    });

    it('should cover sites 1 to 49 exactly once', () => {
      expect(partition.validate()).toEqual({ overlaps: [], gaps: [], outsideUniverse: [] });
      expect(partition.validate(Array.from({ length: 49 }, (_, i) => i + 1))).toEqual({
        overlaps: [],
        gaps: [],
        outsideUniverse: [],
      });
    });

    it('should answer membership for site ids and numbers', () => {
      expect(partition.includes('Alajuela', toSiteId('7'))).toBe(true);
      expect(partition.includes('Alajuela', 18)).toBe(false);
      expect(partition.includes('Alajuela', toSiteId('ABC'))).toBe(false);
      expect(partition.clustersOf(48)).toEqual(['San Ramon']);
      expect(partition.clustersOf(toSiteId('ABC'))).toEqual([]);
      expect(partition.clustersOf(50)).toEqual([]);
    });

    it('should reject unknown cluster names', () => {
      const error = captureError(() => partition.members('Limon'));
      expect(error).toMatchObject({ code: KpiErrorCode.UNKNOWN_CLUSTER, statusCode: 404 });
    });
  });

  describe('validation', () => {
    it('should log overlaps and keep both memberships by default', () => {
      const partition = new ClusterPartition([
        { name: 'A', siteIds: [1, 2] },
        { name: 'B', siteIds: [2, 3] },
      ]);

      expect(partition.clustersOf(2)).toEqual(['A', 'B']);
      expect(mockLogger.warn).toHaveBeenCalledWith('Sites assigned to more than one cluster', {
        overlaps: [{ siteId: 2, clusters: ['A', 'B'] }],
      });
    });

    it('should report gaps inside the member range', () => {
      const partition = new ClusterPartition([
        { name: 'A', siteIds: [1, 2] },
        { name: 'B', siteIds: [4] },
      ]);

      expect(partition.validate().gaps).toEqual([3]);
      expect(mockLogger.warn).toHaveBeenCalledWith('Sites without a cluster', { siteIds: [3] });
    });

    it('should compare against an explicit universe', () => {
      const partition = new ClusterPartition([
        { name: 'A', siteIds: [1, 2] },
        { name: 'B', siteIds: [3, 4] },
      ]);

      expect(partition.validate([1, 2, 3, 4, 5])).toEqual({ overlaps: [], gaps: [5], outsideUniverse: [] });
      expect(partition.validate([1, 2, 3])).toEqual({ overlaps: [], gaps: [], outsideUniverse: [4] });
    });

    it('should fail on overlaps in strict mode', () => {
      const error = captureError(
        () =>
          new ClusterPartition(
            [
              { name: 'A', siteIds: [1, 2] },
              { name: 'B', siteIds: [2, 3] },
            ],
            { strict: true }
          )
      );
      expect(error).toMatchObject({ code: KpiErrorCode.CLUSTER_OVERLAP, details: { siteIds: [2] } });
    });

    it('should fail on gaps in strict mode', () => {
      const error = captureError(
        () => new ClusterPartition([{ name: 'A', siteIds: [1, 2, 4] }], { strict: true, universe: [1, 2, 3, 4] })
      );
      expect(error).toMatchObject({ code: KpiErrorCode.CLUSTER_GAP, details: { siteIds: [3] } });
    });
  });

  describe('fromJson', () => {
    it('should parse a valid definition', () => {
      const partition = ClusterPartition.fromJson([{ name: 'Norte', siteIds: [1] }]);
      expect(partition.definition()).toEqual([{ name: 'Norte', siteIds: [1] }]);
    });

    it('should reject duplicate names and malformed input', () => {
      expect(
        captureError(() =>
          ClusterPartition.fromJson([
            { name: 'A', siteIds: [1] },
            { name: 'A', siteIds: [2] },
          ])
        )
      ).toMatchObject({ code: KpiErrorCode.INVALID_INPUT });
      expect(captureError(() => ClusterPartition.fromJson({ name: 'A' }))).toMatchObject({
        code: KpiErrorCode.INVALID_INPUT,
      });
    });
  });
});

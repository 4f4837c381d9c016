import type { SiteId } from './SiteId';

export interface SiteRecord {
  readonly siteId: SiteId;
  readonly name: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
}

import {
  DiscogsMaster,
  DiscogsReleaseDetail,
  MasterVersion,
  ResolvedRelease,
} from '../../shared/types';
import { createLogger } from '../utils/logger';

import { CatalogClient, CatalogResponse } from './discogsClient';
import { collectPages, VERSIONS_PAGE_SIZE, walkPages } from './paginator';

/**
 * Lookups along the listing → release → master → versions chain.
 *
 * Nothing is cached: two listings pointing at the same release or master
 * each trigger their own requests.
 */
export class ReleaseResolver {
  private logger = createLogger('ReleaseResolver');

  constructor(private client: CatalogClient) {}

  async fetchRelease(
    releaseId: number
  ): Promise<CatalogResponse<DiscogsReleaseDetail>> {
    const response = await this.client.get<DiscogsReleaseDetail>(
      `/releases/${releaseId}`
    );
    if (!response.ok) {
      this.logger.warn(
        `Could not fetch release ${releaseId}: HTTP ${response.status}`
      );
    }
    return response;
  }

  async fetchMaster(
    masterId: number
  ): Promise<CatalogResponse<DiscogsMaster>> {
    const response = await this.client.get<DiscogsMaster>(
      `/masters/${masterId}`
    );
    if (!response.ok) {
      this.logger.warn(
        `Could not fetch master ${masterId}: HTTP ${response.status}`
      );
    }
    return response;
  }

  /**
   * Fetch a release. Returns null when the lookup does not succeed.
   */
  async getRelease(releaseId: number): Promise<DiscogsReleaseDetail | null> {
    const response = await this.fetchRelease(releaseId);
    return response.ok ? response.data : null;
  }

  /**
   * Fetch a master release. Returns null when the lookup does not succeed.
   */
  async getMaster(masterId: number): Promise<DiscogsMaster | null> {
    const response = await this.fetchMaster(masterId);
    return response.ok ? response.data : null;
  }

  /**
   * Fetch every version under a master. A failed page ends the list early.
   */
  async getVersions(masterId: number): Promise<MasterVersion[]> {
    const versions = await collectPages(
      walkPages<MasterVersion>(
        this.client,
        `/masters/${masterId}/versions`,
        'versions',
        { perPage: VERSIONS_PAGE_SIZE, label: `versions of master ${masterId}` }
      )
    );
    this.logger.debug(
      `Fetched ${versions.length} versions for master ${masterId}`
    );
    return versions;
  }

  /**
   * Resolve the full chain for a release. Returns null when the release
   * itself is unavailable; a missing master only leaves `master` null.
   */
  async resolve(releaseId: number): Promise<ResolvedRelease | null> {
    const release = await this.getRelease(releaseId);
    if (!release) {
      return null;
    }

    const masterId = getMasterId(release);
    if (masterId === null) {
      return { release, master: null, versions: [] };
    }

    const master = await this.getMaster(masterId);
    const versions = await this.getVersions(masterId);
    return { release, master, versions };
  }
}

/**
 * The release's master id, or null when it has none. The API reports a
 * missing master as an absent field, null, or 0.
 */
export function getMasterId(release: DiscogsReleaseDetail): number | null {
  return release.master_id ? release.master_id : null;
}

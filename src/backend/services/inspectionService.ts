import {
  DiscogsMaster,
  DiscogsReleaseDetail,
  InventoryPage,
  Listing,
  MasterVersion,
} from '../../shared/types';
import {
  disallowedMajorFormats,
  hasDigitalFormatHint,
} from '../utils/formatRules';
import { normalizeListing } from '../utils/listing';
import { createLogger } from '../utils/logger';

import { CatalogClient } from './discogsClient';
import { getMasterId, ReleaseResolver } from './releaseResolver';

export const DEFAULT_INSPECT_COUNT = 10;
export const MAX_INSPECT_COUNT = 100;

export interface ListingInspection {
  listing: Listing;
  /** null when the release lookup failed */
  release: DiscogsReleaseDetail | null;
  /** HTTP status of the release lookup; null when none was made */
  releaseStatus: number | null;
  masterId: number | null;
  /** null when there is no master or its lookup failed */
  master: DiscogsMaster | null;
  /** HTTP status of the master lookup; null when none was made */
  masterStatus: number | null;
}

export interface FormatGroup {
  format: string;
  count: number;
}

export interface DisallowedVersion {
  version: MasterVersion;
  formats: string[];
}

export interface RuleDisagreement {
  version: MasterVersion;
  /** Verdict of the major-formats rule for this version */
  disallowedMajorFormat: boolean;
  /** Verdict of the format-string heuristic for this version */
  digitalHint: boolean;
}

export interface FormatReport {
  release: DiscogsReleaseDetail;
  masterId: number | null;
  versions: MasterVersion[];
  formatGroups: FormatGroup[];
  disallowed: DisallowedVersion[];
  disagreements: RuleDisagreement[];
  vinylOnly: boolean;
}

export class InspectionError extends Error {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'InspectionError';
  }
}

/**
 * Diagnostics for looking at raw catalog data behind the scan: what a
 * seller's first listings resolve to, and how a release's versions break
 * down by format.
 */
export class InspectionService {
  private resolver: ReleaseResolver;
  private logger = createLogger('InspectionService');

  constructor(private client: CatalogClient) {
    this.resolver = new ReleaseResolver(client);
  }

  /**
   * Fetch the first `count` listings of a seller with their release and
   * master records.
   */
  async inspectListings(
    seller: string,
    count = DEFAULT_INSPECT_COUNT
  ): Promise<ListingInspection[]> {
    const perPage = Math.min(Math.max(count, 1), MAX_INSPECT_COUNT);
    this.logger.info(`Fetching first ${perPage} listings from ${seller}...`);

    const response = await this.client.get<InventoryPage>(
      `/users/${encodeURIComponent(seller)}/inventory`,
      { per_page: perPage, page: 1 }
    );
    if (!response.ok) {
      throw new InspectionError(
        `Could not fetch inventory for ${seller}: HTTP ${response.status}`,
        response.status
      );
    }

    const inspections: ListingInspection[] = [];
    for (const raw of response.data.listings ?? []) {
      const listing = normalizeListing(raw);
      inspections.push(await this.inspectListing(listing));
    }
    return inspections;
  }

  private async inspectListing(listing: Listing): Promise<ListingInspection> {
    const inspection: ListingInspection = {
      listing,
      release: null,
      releaseStatus: null,
      masterId: null,
      master: null,
      masterStatus: null,
    };
    if (listing.releaseId === null) {
      return inspection;
    }

    const releaseResponse = await this.resolver.fetchRelease(
      listing.releaseId
    );
    inspection.releaseStatus = releaseResponse.status;
    if (!releaseResponse.ok) {
      return inspection;
    }
    inspection.release = releaseResponse.data;

    const masterId = getMasterId(releaseResponse.data);
    if (masterId === null) {
      return inspection;
    }
    inspection.masterId = masterId;

    const masterResponse = await this.resolver.fetchMaster(masterId);
    inspection.masterStatus = masterResponse.status;
    if (masterResponse.ok) {
      inspection.master = masterResponse.data;
    }
    return inspection;
  }

  /**
   * Break down every version of a release's master by format.
   */
  async buildFormatReport(releaseId: number): Promise<FormatReport> {
    this.logger.info(`Fetching release ${releaseId}...`);
    const resolved = await this.resolver.resolve(releaseId);
    if (!resolved) {
      throw new InspectionError(`Could not fetch release ${releaseId}`);
    }

    const { release, versions } = resolved;
    const disallowed = findDisallowed(versions);
    return {
      release,
      masterId: getMasterId(release),
      versions,
      formatGroups: groupByFormat(versions),
      disallowed,
      disagreements: findDisagreements(versions),
      vinylOnly: disallowed.length === 0,
    };
  }
}

export function groupByFormat(versions: MasterVersion[]): FormatGroup[] {
  const counts = new Map<string, number>();
  for (const version of versions) {
    const format = version.format || 'Unknown';
    counts.set(format, (counts.get(format) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([format, count]) => ({ format, count }))
    .sort((a, b) => (a.format < b.format ? -1 : a.format > b.format ? 1 : 0));
}

export function findDisallowed(
  versions: MasterVersion[]
): DisallowedVersion[] {
  return versions
    .map(version => ({ version, formats: disallowedMajorFormats(version) }))
    .filter(entry => entry.formats.length > 0);
}

/**
 * Versions the two non-vinyl rules judge differently, e.g. a vinyl pressing
 * whose format string mentions a download ("File") while its major formats
 * are only Vinyl.
 */
export function findDisagreements(
  versions: MasterVersion[]
): RuleDisagreement[] {
  return versions
    .map(version => ({
      version,
      disallowedMajorFormat: disallowedMajorFormats(version).length > 0,
      digitalHint: hasDigitalFormatHint(version),
    }))
    .filter(entry => entry.disallowedMajorFormat !== entry.digitalHint);
}

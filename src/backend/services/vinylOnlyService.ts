import {
  InventoryListing,
  Listing,
  ListingClassification,
  ScanSummary,
} from '../../shared/types';
import {
  effectiveGenres,
  hasNonVinylVersion,
  hasVinylFormat,
  matchesGenre,
} from '../utils/formatRules';
import { formatSummaryLines, formatVerdictLine } from '../utils/formatting';
import { normalizeListing } from '../utils/listing';
import { createLogger } from '../utils/logger';

import { CatalogClient } from './discogsClient';
import { INVENTORY_PAGE_SIZE, walkPages } from './paginator';
import { getMasterId, ReleaseResolver } from './releaseResolver';

export type OutputWriter = (line: string) => void;

const stdoutWriter: OutputWriter = line => console.log(line);

/**
 * Classifies a seller's listings as vinyl-only or not.
 *
 * A listing passes when its release has a Vinyl format and no other version
 * under the same master was issued in a major format besides Vinyl or
 * Cassette. Listings are processed one at a time; each may need a release,
 * a master and several version-list requests.
 */
export class VinylOnlyService {
  private resolver: ReleaseResolver;
  private logger = createLogger('VinylOnlyService');

  constructor(
    private client: CatalogClient,
    private output: OutputWriter = stdoutWriter
  ) {
    this.resolver = new ReleaseResolver(client);
  }

  /**
   * Stream a seller's inventory, 100 listings per request.
   */
  async *listInventory(seller: string): AsyncGenerator<Listing> {
    const walk = walkPages<InventoryListing>(
      this.client,
      `/users/${encodeURIComponent(seller)}/inventory`,
      'listings',
      {
        perPage: INVENTORY_PAGE_SIZE,
        label: `inventory for ${seller}`,
        reportProgress: true,
      }
    );

    for await (const raw of walk) {
      yield normalizeListing(raw);
    }
  }

  /**
   * Decide whether one listing is vinyl-only.
   *
   * @param genreFilter - genre the listing must carry, or null for no filter
   */
  async classifyListing(
    listing: Listing,
    genreFilter: string | null
  ): Promise<ListingClassification> {
    const releaseId = listing.releaseId;
    if (releaseId === null) {
      return { outcome: 'skip', reason: 'missing-release-id' };
    }

    const release = await this.resolver.getRelease(releaseId);
    if (!release) {
      return { outcome: 'skip', reason: 'release-unavailable' };
    }

    if (!hasVinylFormat(release.formats)) {
      return { outcome: 'skip', reason: 'not-vinyl' };
    }

    const masterId = getMasterId(release);
    // Best-effort: genres fall back to the release's own when this fails
    const master =
      masterId !== null ? await this.resolver.getMaster(masterId) : null;
    const genres = effectiveGenres(release, master);

    if (genreFilter && !matchesGenre(genres, genreFilter)) {
      return { outcome: 'skip', reason: 'genre-mismatch' };
    }

    if (masterId === null) {
      return {
        outcome: 'pass',
        reason: 'no master release',
        versionCount: null,
        genres,
        releaseId,
      };
    }

    const versions = await this.resolver.getVersions(masterId);
    const versionCount = versions.length;

    if (hasNonVinylVersion(versions)) {
      return {
        outcome: 'fail',
        reason: `has non-vinyl (${versionCount} versions)`,
        versionCount,
        genres,
        releaseId,
      };
    }

    return {
      outcome: 'pass',
      reason: `${versionCount} versions, vinyl/cassette only`,
      versionCount,
      genres,
      releaseId,
    };
  }

  /**
   * Scan a seller's whole inventory, writing one line per checked listing
   * and a closing summary to the output.
   */
  async scanSeller(
    seller: string,
    genreFilter: string | null
  ): Promise<ScanSummary> {
    const summary: ScanSummary = {
      seller,
      genreFilter,
      listingsSeen: 0,
      checked: 0,
      vinylOnly: 0,
    };

    this.logger.info(`Fetching inventory for seller: ${seller}`);
    if (genreFilter) {
      this.logger.info(`Genre filter: ${genreFilter}`);
    }
    this.logger.info('Format filter: Vinyl only');
    this.logger.info('Scanning inventory...');

    for await (const listing of this.listInventory(seller)) {
      summary.listingsSeen++;

      const classification = await this.classifySafely(listing, genreFilter);
      if (classification.outcome === 'skip') {
        this.logger.debug(
          `Skipped listing ${listing.listingId} (release ${listing.releaseId ?? 'none'}): ${classification.reason}`
        );
        continue;
      }

      summary.checked++;
      if (classification.outcome === 'pass') {
        summary.vinylOnly++;
      }
      this.output(formatVerdictLine(summary.checked, listing, classification));
    }

    formatSummaryLines(summary).forEach(line => this.output(line));
    return summary;
  }

  private async classifySafely(
    listing: Listing,
    genreFilter: string | null
  ): Promise<ListingClassification> {
    try {
      return await this.classifyListing(listing, genreFilter);
    } catch (error) {
      this.logger.error(
        `Failed to check listing ${listing.listingId} (release ${listing.releaseId ?? 'none'})`,
        error
      );
      return { outcome: 'skip', reason: 'lookup-error' };
    }
  }
}

// Raw Discogs API shapes. Only the fields the finder reads are declared;
// every field the API may omit is optional.

export interface DiscogsPagination {
  page?: number;
  pages?: number;
  per_page?: number;
  items?: number;
}

export interface DiscogsPrice {
  value?: number;
  currency?: string;
}

export interface InventoryListingRelease {
  id?: number;
  description?: string;
  title?: string;
  artist?: string;
  format?: string;
  year?: number;
}

export interface InventoryListing {
  id: number;
  condition?: string;
  sleeve_condition?: string;
  price?: DiscogsPrice;
  uri?: string;
  release?: InventoryListingRelease;
}

export interface InventoryPage {
  pagination?: DiscogsPagination;
  listings?: InventoryListing[];
}

export interface DiscogsFormat {
  name?: string;
  qty?: string;
  descriptions?: string[];
  text?: string;
}

export interface DiscogsArtistCredit {
  name: string;
}

export interface DiscogsReleaseDetail {
  id: number;
  title?: string;
  master_id?: number | null;
  artists?: DiscogsArtistCredit[];
  formats?: DiscogsFormat[];
  genres?: string[];
  styles?: string[];
}

export interface DiscogsMaster {
  id: number;
  title?: string;
  genres?: string[];
  styles?: string[];
}

export interface MasterVersion {
  id: number;
  title?: string;
  format?: string;
  major_formats?: string[];
  country?: string;
  label?: string;
  catno?: string;
  released?: string;
}

export interface MasterVersionsPage {
  pagination?: DiscogsPagination;
  versions?: MasterVersion[];
}

// Normalized domain types

export interface ListingPrice {
  value: number | null;
  currency: string;
}

/**
 * A seller's inventory entry, normalized from {@link InventoryListing}.
 */
export interface Listing {
  listingId: number;
  releaseId: number | null;
  title: string;
  artist: string;
  format: string;
  condition: string;
  sleeveCondition: string;
  price: ListingPrice;
}

export interface ResolvedRelease {
  release: DiscogsReleaseDetail;
  master: DiscogsMaster | null;
  versions: MasterVersion[];
}

export type SkipReason =
  | 'missing-release-id'
  | 'release-unavailable'
  | 'not-vinyl'
  | 'genre-mismatch'
  | 'lookup-error';

export interface VerdictDetail {
  reason: string;
  /** null when the release has no master, so no versions were checked */
  versionCount: number | null;
  genres: string[];
  releaseId: number;
}

export type ListingVerdict = { outcome: 'pass' | 'fail' } & VerdictDetail;

export type ListingClassification =
  | { outcome: 'skip'; reason: SkipReason }
  | ListingVerdict;

export interface ScanSummary {
  seller: string;
  genreFilter: string | null;
  listingsSeen: number;
  checked: number;
  vinylOnly: number;
}

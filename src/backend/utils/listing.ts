import {
  InventoryListing,
  InventoryListingRelease,
  Listing,
} from '../../shared/types';

/**
 * Normalize a raw inventory entry. Missing text fields fall back to
 * placeholders; a missing release id is kept as null so the listing can be
 * counted and skipped.
 */
export function normalizeListing(raw: InventoryListing): Listing {
  const release: InventoryListingRelease = raw.release ?? {};
  const amount = raw.price?.value;

  return {
    listingId: raw.id,
    releaseId: typeof release.id === 'number' ? release.id : null,
    title: release.title || release.description || 'Unknown',
    artist: release.artist || 'Unknown',
    format: release.format || '',
    condition: raw.condition || 'Unknown',
    sleeveCondition: raw.sleeve_condition || 'Unknown',
    price: {
      value: typeof amount === 'number' ? amount : null,
      currency: raw.price?.currency || '',
    },
  };
}

export function releaseUrl(releaseId: number): string {
  return `https://www.discogs.com/release/${releaseId}`;
}

import {
  DiscogsFormat,
  Listing,
  ListingPrice,
  ListingVerdict,
  ScanSummary,
} from '../../shared/types';
import {
  FormatReport,
  ListingInspection,
} from '../services/inspectionService';

import { releaseUrl } from './listing';

export const RULE = '='.repeat(80);

export function formatPrice(price: ListingPrice): string {
  const amount = price.value === null ? '' : price.value.toFixed(2);
  return `${amount} ${price.currency}`.trim() || 'n/a';
}

export function formatGenres(genres: string[]): string {
  return genres.length > 0 ? genres.join(', ') : 'Unknown';
}

export function formatStatus(verdict: ListingVerdict): string {
  return verdict.outcome === 'pass'
    ? `✓ VINYL-ONLY (${verdict.reason})`
    : `✗ ${verdict.reason}`;
}

/**
 * One result line, e.g.
 * `[3] ✓ VINYL-ONLY (no master release) | Electronic | Artist - Title | 25.00 USD | https://www.discogs.com/release/1`
 */
export function formatVerdictLine(
  sequence: number,
  listing: Listing,
  verdict: ListingVerdict
): string {
  return [
    `[${sequence}] ${formatStatus(verdict)}`,
    formatGenres(verdict.genres),
    `${listing.artist} - ${listing.title}`,
    formatPrice(listing.price),
    releaseUrl(verdict.releaseId),
  ].join(' | ');
}

export function formatSummaryLines(summary: ScanSummary): string[] {
  return [
    '',
    RULE,
    `Total: ${summary.listingsSeen} fetched, ${summary.checked} matched filters, ${summary.vinylOnly} vinyl-only`,
  ];
}

function list(values: string[] | undefined): string {
  return values && values.length > 0 ? values.join(', ') : '(none)';
}

function lookupFailure(status: number | null): string {
  return status === null
    ? '(lookup failed)'
    : `(lookup failed: HTTP ${status})`;
}

export function formatListingInspection(
  inspection: ListingInspection,
  index: number
): string[] {
  const { listing, release, masterId, master } = inspection;
  const lines = [
    RULE,
    `ENTRY #${index}`,
    RULE,
    `Title:       ${listing.title}`,
    `Artist:      ${listing.artist}`,
    `Release ID:  ${listing.releaseId ?? 'Unknown'}`,
    `Format:      ${listing.format || 'Not specified'}`,
  ];

  if (listing.releaseId !== null) {
    if (release) {
      lines.push(
        `Genres:      ${list(release.genres)}`,
        `Styles:      ${list(release.styles)}`,
        `Formats:     ${list((release.formats ?? []).map(describeFormat))}`
      );
      if (masterId === null) {
        lines.push('Master:      (none)');
      } else if (master) {
        lines.push(
          `Master ID:   ${masterId}`,
          `  Genres:    ${list(master.genres)}`,
          `  Styles:    ${list(master.styles)}`
        );
      } else {
        lines.push(
          `Master ID:   ${masterId} ${lookupFailure(inspection.masterStatus)}`
        );
      }
    } else {
      lines.push(
        `Release:     ${lookupFailure(inspection.releaseStatus)}`
      );
    }
  }

  lines.push(
    `Price:       ${formatPrice(listing.price)}`,
    `Condition:   ${listing.condition} / ${listing.sleeveCondition}`
  );
  if (listing.releaseId !== null) {
    lines.push(`URL:         ${releaseUrl(listing.releaseId)}`);
  }
  lines.push('');
  return lines;
}

function describeFormat(format: DiscogsFormat): string {
  const name = format.name ?? 'Unknown';
  const descriptions = format.descriptions ?? [];
  return descriptions.length > 0
    ? `${name} (${descriptions.join(', ')})`
    : name;
}

// Longest list of offending versions printed before truncating
const MAX_LISTED_VERSIONS = 10;

export interface FormatReportOptions {
  /** Dump each version's API record as indented JSON */
  raw?: boolean;
}

export function formatFormatReport(
  report: FormatReport,
  options: FormatReportOptions = {}
): string[] {
  const { release, masterId, versions } = report;
  const lines = [
    `Release: ${release.title ?? 'Unknown'}`,
    `Artist: ${release.artists?.[0]?.name ?? 'Unknown'}`,
  ];

  if (masterId === null) {
    lines.push(
      '',
      'No master release ID found. This release has no other versions.'
    );
    return lines;
  }

  lines.push(`Master ID: ${masterId}`, `Found ${versions.length} versions`);

  lines.push('', RULE, 'ALL VERSIONS:');
  versions.forEach((version, i) => {
    lines.push(
      '',
      `[${i + 1}] ${version.title ?? 'Unknown'}`,
      `    Format: ${version.format || 'Unknown'} (major: ${list(version.major_formats)})`,
      `    Country: ${version.country || 'Unknown'} | Year: ${version.released || 'Unknown'}`,
      `    Label: ${version.label || 'Unknown'} (${version.catno ?? ''})`,
      `    URL: ${releaseUrl(version.id)}`
    );
    if (options.raw) {
      lines.push(
        '    Raw data:',
        ...JSON.stringify(version, null, 2)
          .split('\n')
          .map(line => `      ${line}`)
      );
    }
  });

  lines.push('', RULE, 'FORMAT SUMMARY:');
  report.formatGroups.forEach(group => {
    lines.push(`${group.format}: ${group.count} versions`);
  });

  lines.push('', RULE, 'FORMAT CHECK (major formats):');
  if (report.disallowed.length > 0) {
    lines.push(
      `✗ Found ${report.disallowed.length} versions with non-vinyl/non-cassette formats:`
    );
    report.disallowed.slice(0, MAX_LISTED_VERSIONS).forEach(entry => {
      lines.push(
        `  - ${entry.version.title ?? entry.version.id}: ${entry.formats.join(', ')}`
      );
    });
    if (report.disallowed.length > MAX_LISTED_VERSIONS) {
      lines.push(
        `  ... and ${report.disallowed.length - MAX_LISTED_VERSIONS} more`
      );
    }
    lines.push('✗ This release HAS non-vinyl/non-cassette versions');
  } else {
    lines.push(
      '✓ No non-vinyl/non-cassette formats found - this is VINYL/CASSETTE-ONLY'
    );
  }

  if (report.disagreements.length > 0) {
    lines.push('', 'RULE DISAGREEMENTS (major formats vs. format text):');
    report.disagreements.forEach(entry => {
      const verdict = entry.disallowedMajorFormat
        ? 'non-vinyl by major formats only'
        : 'digital hint in format text only';
      lines.push(
        `  - ${entry.version.title ?? entry.version.id} [${entry.version.format || 'Unknown'}]: ${verdict}`
      );
    });
  }

  lines.push(
    '',
    `Total versions: ${versions.length}`,
    `Vinyl/Cassette only: ${versions.length - report.disallowed.length}`,
    `Has other formats: ${report.disallowed.length}`
  );
  return lines;
}

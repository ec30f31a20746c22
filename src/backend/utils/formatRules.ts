import {
  DiscogsFormat,
  DiscogsMaster,
  DiscogsReleaseDetail,
  MasterVersion,
} from '../../shared/types';

// Major formats a sibling pressing may carry without disqualifying a release
export const ALLOWED_MAJOR_FORMATS = ['vinyl', 'cassette'];

// Substrings of a version's granular format string that suggest a digital or
// CD issue. Only used to flag disagreements with the major-formats rule.
export const DIGITAL_FORMAT_HINTS = [
  'cd',
  'mp3',
  'wav',
  'flac',
  'aac',
  'file',
  'digital',
];

/**
 * True when one of the release's format descriptors is named "Vinyl".
 * The name must match exactly (ignoring case), so "Vinyl-like" does not count.
 */
export function hasVinylFormat(formats: DiscogsFormat[] | undefined): boolean {
  return (formats ?? []).some(
    format => (format.name ?? '').toLowerCase() === 'vinyl'
  );
}

/**
 * Major formats of a version that fall outside the allow-list.
 */
export function disallowedMajorFormats(version: MasterVersion): string[] {
  return (version.major_formats ?? []).filter(
    format => !ALLOWED_MAJOR_FORMATS.includes(format.toLowerCase())
  );
}

export function hasNonVinylVersion(versions: MasterVersion[]): boolean {
  return versions.some(version => disallowedMajorFormats(version).length > 0);
}

/**
 * Heuristic check on the granular format string, e.g. "CD, Album" or
 * "File, FLAC". Disagrees with the major-formats rule on releases such as
 * vinyl with a download card.
 */
export function hasDigitalFormatHint(version: MasterVersion): boolean {
  const format = (version.format ?? '').toLowerCase();
  return DIGITAL_FORMAT_HINTS.some(hint => format.includes(hint));
}

/**
 * Genres used for filtering and display: the master's when one resolved,
 * otherwise the release's own.
 */
export function effectiveGenres(
  release: DiscogsReleaseDetail,
  master: DiscogsMaster | null
): string[] {
  return (master ? master.genres : release.genres) ?? [];
}

/**
 * Case-insensitive exact membership: "Rock" does not match "Rock and Roll".
 */
export function matchesGenre(genres: string[], filter: string): boolean {
  const wanted = filter.toLowerCase();
  return genres.some(genre => genre.toLowerCase() === wanted);
}

import { validateSellerName } from './validation';

export const DEFAULT_GENRE_FILTER = 'Electronic';

export class SellerUrlError extends Error {
  constructor(
    public url: string,
    message: string
  ) {
    super(message);
    this.name = 'SellerUrlError';
  }
}

export interface ParsedSellerUrl {
  seller: string;
  /** Query parameters of the URL; repeated keys keep every value */
  query: Record<string, string[]>;
}

/**
 * Extract the seller name and filters from a seller profile URL such as
 * `https://www.discogs.com/seller/some-shop/profile?format=Vinyl&genre=Jazz`.
 */
export function parseSellerUrl(url: string): ParsedSellerUrl {
  const match = url.match(/\/seller\/([^/?#]+)/);
  if (!match) {
    throw new SellerUrlError(url, `Invalid Discogs seller URL: ${url}`);
  }

  let seller: string;
  try {
    seller = decodeURIComponent(match[1]);
  } catch {
    throw new SellerUrlError(url, `Invalid seller name in URL: ${url}`);
  }
  if (!validateSellerName(seller)) {
    throw new SellerUrlError(url, `Invalid seller name in URL: ${seller}`);
  }

  const queryStart = url.indexOf('?');
  const queryString =
    queryStart >= 0 ? url.slice(queryStart + 1).split('#')[0] : '';
  const query: Record<string, string[]> = {};
  new URLSearchParams(queryString).forEach((value, key) => {
    if (!query[key]) {
      query[key] = [];
    }
    query[key].push(value);
  });

  return { seller, query };
}

/**
 * Decide the genre filter for a scan.
 *
 * A non-empty `genre` query parameter in the seller URL wins. Otherwise an
 * omitted command-line genre means {@link DEFAULT_GENRE_FILTER} and an empty
 * one disables genre filtering (null).
 */
export function resolveGenreFilter(
  cliGenre: string | undefined,
  query: Record<string, string[]>
): string | null {
  const urlGenre = query.genre?.find(value => value.trim() !== '');
  if (urlGenre) {
    return urlGenre.trim();
  }
  if (cliGenre === undefined) {
    return DEFAULT_GENRE_FILTER;
  }
  const genre = cliGenre.trim();
  return genre === '' ? null : genre;
}

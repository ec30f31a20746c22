/**
 * Input validation for command-line arguments
 */

/**
 * Validates a Discogs seller name before it is used in an API path.
 * Allows letters, digits, dot, underscore and hyphen; 1-64 characters.
 */
export function validateSellerName(seller: string): boolean {
  const SELLER_PATTERN = /^[a-zA-Z0-9._-]{1,64}$/;
  return Boolean(
    seller && SELLER_PATTERN.test(seller) && !seller.includes('..')
  );
}

/**
 * Validates that a numeric ID is a positive integer. Strings must be plain
 * digits, so forms such as "1e3", "0x10" or "1.0" are rejected.
 */
export function validateNumericId(id: unknown): boolean {
  if (typeof id === 'string') {
    return /^\d+$/.test(id) && Number(id) > 0;
  }
  return typeof id === 'number' && Number.isInteger(id) && id > 0;
}

/**
 * Parses a positive integer argument within [min, max].
 * Returns null when the value is not a whole number in range.
 */
export function parseBoundedInt(
  value: string,
  min: number,
  max: number
): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const parsed = parseInt(value, 10);
  return parsed >= min && parsed <= max ? parsed : null;
}

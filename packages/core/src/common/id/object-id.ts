/**
 * Object identifier (content hash in hex format)
 *
 * SHA-256: 64 hex characters (256 bits / 4 bits per char)
 * SHA-1: 40 hex characters (160 bits / 4 bits per char)
 */
export type ObjectId = string;

/**
 * Git format constants
 */
export const GitFormat = {
  /** SHA-1 hash string length (hex) */
  OBJECT_ID_STRING_LENGTH: 40,
  /** SHA-256 hash string length (hex) */
  OBJECT_ID_256_STRING_LENGTH: 64,
  /** Shortest abbreviation accepted when matching ids by prefix */
  MIN_ABBREVIATED_LENGTH: 4,
} as const;

const HEX = /^[0-9a-f]+$/;

/**
 * Check whether a string is a full object id (SHA-1 or SHA-256, lowercase hex).
 */
export function isObjectId(value: string): boolean {
  return (
    (value.length === GitFormat.OBJECT_ID_STRING_LENGTH ||
      value.length === GitFormat.OBJECT_ID_256_STRING_LENGTH) &&
    HEX.test(value)
  );
}

/**
 * Check whether a string can abbreviate an object id.
 *
 * @param value Candidate prefix
 * @param minLength Shortest accepted prefix
 */
export function isObjectIdPrefix(
  value: string,
  minLength: number = GitFormat.MIN_ABBREVIATED_LENGTH,
): boolean {
  return (
    value.length >= minLength &&
    value.length <= GitFormat.OBJECT_ID_256_STRING_LENGTH &&
    HEX.test(value)
  );
}

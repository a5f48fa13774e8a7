/**
 * Case-insensitive term identity
 */

const WHITESPACE_RUN_PATTERN = /\s+/g;

/**
 * Canonical lookup key for a term: NFC, whitespace collapsed, lower-cased.
 * "Pressure  Transmitter" and "pressure transmitter" share one key.
 */
export function toTermKey(term: string): string {
  return term
    .normalize("NFC")
    .replace(WHITESPACE_RUN_PATTERN, " ")
    .trim()
    .toLowerCase();
}

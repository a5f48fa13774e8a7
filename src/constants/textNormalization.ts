/**
 * Text normalization constants and tunables
 *
 * Parameters for the OCR cleanup applied to raw page text before
 * candidate generation.
 */

/**
 * Minimum number of consecutive doubled letter pairs before a run is
 * treated as systemic OCR doubling ("Tthhee" = 3 pairs).
 * Below this, double letters are assumed to be genuine ("pressure").
 */
export const MIN_DOUBLED_PAIRS = 3;

/**
 * Font/encoding placeholders emitted by PDF text extraction, e.g. "(cid:72)"
 */
export const CID_PLACEHOLDER_PATTERN = /\(?cid:\d+\)?/gi;

/**
 * Hyphenated word broken across a line: "nitro-\ngen".
 * Only joins when a lower-case letter continues the word on the next line.
 */
export const LINE_BREAK_HYPHENATION_PATTERN =
  /(\p{L})[-\u2010\u00AD][ \t]*\r?\n[ \t]*(\p{Ll})/gu;

/**
 * Spelled-out word: one letter of any case, then at least three single
 * lower-case letters, separated by one space ("T e m p e r a t u r e").
 * Enumerations of capitals ("A B C D") never match. The lookarounds keep
 * the run from starting or ending inside a word.
 */
export const SPACED_LETTERS_PATTERN =
  /(?<![\p{L}\p{N}])\p{L}(?: \p{Ll}){3,}(?![\p{L}\p{N}])/gu;

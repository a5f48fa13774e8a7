/**
 * Extraction pipeline tunables
 */

export const DEFAULT_PAGE_CONCURRENCY = 4;

/**
 * Document-level deadline; pages not started by then are dropped
 */
export const DEFAULT_DOCUMENT_TIMEOUT_MS = 30_000;

export const DEFAULT_MIN_FREQUENCY = 1;

/**
 * Distinct sentences per term handed to the definition synthesizer
 */
export const MAX_DEFINITION_SENTENCES = 5;

/**
 * Reported when preprocessing reduces a candidate to nothing
 */
export const EMPTY_AFTER_PREPROCESSING_REASON = "empty after preprocessing";

/**
 * Reported when a term occurs less often than the minimum frequency
 */
export const BELOW_MIN_FREQUENCY_REASON = "below minimum frequency";

/**
 * Glossary aggregation constants
 */

/**
 * Tags given to terms created without explicit domain tags
 */
export const DEFAULT_DOMAIN_TAGS: readonly string[] = ["extracted"];

/**
 * Parallel term writes during batch ingestion (same-term writes are
 * always serialized)
 */
export const DEFAULT_INGEST_CONCURRENCY = 8;

/**
 * Save attempts for one term before a conflict is surfaced
 */
export const MAX_SAVE_ATTEMPTS = 2;

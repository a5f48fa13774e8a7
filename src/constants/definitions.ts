/**
 * Definition synthesis constants
 */

/**
 * A captured defining clause shorter than this is not a definition
 */
export const MIN_DEFINITION_CLAUSE_LENGTH = 10;

/**
 * Upper bound for a context snippet fallback (sentence part only)
 */
export const MAX_SNIPPET_LENGTH = 250;

/**
 * Page numbers listed in a fallback annotation before "+N more"
 */
export const MAX_LISTED_PAGES = 3;

/**
 * Verbs introducing a definition after the term, tried in order
 */
export const DEFINING_VERBS: readonly string[] = [
  "means",
  "refers to",
  "denotes",
  "defines",
  "represents",
  "describes",
];

export const CONTEXT_SNIPPET_PREFIX = "Found in context";

export const NO_CONTEXT_PREFIX = "Technical term";

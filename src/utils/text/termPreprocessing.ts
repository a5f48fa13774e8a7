/**
 * Term preprocessing
 *
 * Cleans one candidate string before validation. An empty result means
 * the candidate is discarded without being validated.
 */

import type { Lexicon } from "@/types";

const WHITESPACE_RUN_PATTERN = /\s+/g;
const EDGE_HYPHENS_PATTERN =
  /^[-\u2010\u2011\u2013\u2014\s]+|[-\u2010\u2011\u2013\u2014\s]+$/g;

/**
 * Removes one leading article when more tokens follow it.
 * Mid-phrase articles are never touched ("Point of the Valve" stays).
 */
export function stripLeadingArticle(
  term: string,
  articles: ReadonlySet<string>,
): string {
  const spaceIndex = term.indexOf(" ");
  if (spaceIndex <= 0) {
    return term;
  }
  const first = term.slice(0, spaceIndex).toLowerCase();
  return articles.has(first) ? term.slice(spaceIndex + 1) : term;
}

/**
 * Preprocesses a raw candidate:
 * 1. Collapse internal whitespace and trim
 * 2. Strip a single leading article (language lexicon)
 * 3. Strip leading/trailing hyphens left by truncated extraction
 *
 * @example
 * preprocessTerm("The  Pressure Transmitter", en) // "Pressure Transmitter"
 * preprocessTerm("Mem-", en)                      // "Mem"
 * preprocessTerm("die Pumpe", de)                 // "Pumpe"
 */
export function preprocessTerm(raw: unknown, lexicon: Lexicon): string {
  if (typeof raw !== "string") {
    return "";
  }
  const collapsed = raw.replace(WHITESPACE_RUN_PATTERN, " ").trim();
  const withoutArticle = stripLeadingArticle(collapsed, lexicon.articles);
  return withoutArticle.replace(EDGE_HYPHENS_PATTERN, "").trim();
}

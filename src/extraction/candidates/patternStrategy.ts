/**
 * Pattern strategy: regex-based term occurrences
 *
 * Always available. Catches capitalized multi-word terms, acronyms,
 * hyphenated compounds and standards codes.
 */

import {
  ACRONYM_PATTERN,
  CAPITALIZED_SEQUENCE_PATTERN,
  HYPHENATED_COMPOUND_PATTERN,
  STANDARDS_CODE_PATTERN,
} from "@/constants/candidates";

const PATTERNS: readonly RegExp[] = [
  CAPITALIZED_SEQUENCE_PATTERN,
  ACRONYM_PATTERN,
  HYPHENATED_COMPOUND_PATTERN,
  STANDARDS_CODE_PATTERN,
];

/**
 * All pattern occurrences in a sentence, in pattern order then position.
 * Repeats are kept: one entry per occurrence.
 *
 * @example
 * findPatternOccurrences("The PLC talks to the Safety Controller via ISO 9001.")
 * // ["The PLC", "Safety Controller", "PLC", "ISO", "ISO 9001"]
 */
export function findPatternOccurrences(sentence: string): string[] {
  const occurrences: string[] = [];
  for (const pattern of PATTERNS) {
    for (const match of sentence.matchAll(pattern)) {
      occurrences.push(match[0]);
    }
  }
  return occurrences;
}

/**
 * Linguistic strategy: noun phrases and named entities from an analyzer
 */

import type { CandidateStrategy, LinguisticAnalyzer } from "@/types";
import { EDGE_PUNCTUATION_PATTERN } from "@/constants/candidates";
import * as logger from "@/logger";

function cleanPhrase(phrase: string): string {
  return phrase.replace(EDGE_PUNCTUATION_PATTERN, "").replace(/\s+/g, " ");
}

/**
 * Phrases the analyzer finds in a sentence, edge punctuation removed.
 * An analyzer failure on one sentence is logged and yields no phrases
 * for that sentence; the pattern strategy still covers it.
 */
export function findLinguisticOccurrences(
  sentence: string,
  analyzer: LinguisticAnalyzer,
): string[] {
  let phrases: string[];
  try {
    phrases = analyzer.extractPhrases(sentence);
  } catch (err) {
    logger.warn("Linguistic analyzer failed on sentence", {
      analyzer: analyzer.name,
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }
  return phrases.map(cleanPhrase).filter((phrase) => phrase.length > 0);
}

/**
 * Strategies active for a given analyzer (pattern-only when none)
 */
export function describeStrategies(
  analyzer: LinguisticAnalyzer | null | undefined,
): CandidateStrategy[] {
  return analyzer ? ["pattern", "linguistic"] : ["pattern"];
}

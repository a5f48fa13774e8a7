/**
 * Linguistic analyzer backed by the compromise NLP library
 *
 * compromise is loaded on demand. When it cannot be loaded the pipeline
 * runs in pattern-only mode; that degraded mode is logged, not hidden.
 */

import type { LinguisticAnalyzer } from "@/types";
import * as logger from "@/logger";

type Nlp = typeof import("compromise").default;

function toStrings(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

/**
 * Noun phrases followed by named entities (people, places, organizations)
 */
export function createCompromiseAnalyzer(nlp: Nlp): LinguisticAnalyzer {
  return {
    name: "compromise",
    extractPhrases(sentence: string): string[] {
      const doc = nlp(sentence);
      return [
        ...toStrings(doc.nouns().out("array")),
        ...toStrings(doc.topics().out("array")),
      ];
    },
  };
}

/**
 * Capability check for the linguistic strategy.
 *
 * @returns The analyzer, or null when compromise is not available
 */
export async function loadLinguisticAnalyzer(): Promise<LinguisticAnalyzer | null> {
  try {
    const compromise = await import("compromise");
    return createCompromiseAnalyzer(compromise.default);
  } catch (err) {
    logger.warn("Linguistic analyzer unavailable, using pattern strategy only", {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

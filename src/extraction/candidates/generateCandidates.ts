/**
 * Candidate generation for one normalized page
 *
 * Runs the pattern strategy and, when an analyzer is available, the
 * linguistic strategy over every sentence, and unions their outputs.
 * Identical raw text on the page collapses into one candidate whose
 * frequency is the number of occurrences.
 */

import type {
  Candidate,
  GenerateCandidatesOptions,
  LinguisticAnalyzer,
  NormalizedPage,
} from "@/types";
import * as logger from "@/logger";
import { boundSentence, buildContext, splitSentences } from "./sentences";
import { findPatternOccurrences } from "./patternStrategy";
import { findLinguisticOccurrences } from "./linguisticStrategy";

/**
 * Occurrence counts for one sentence. A string found by both strategies
 * counts once per occurrence, not once per strategy.
 */
function countSentenceOccurrences(
  sentence: string,
  analyzer: LinguisticAnalyzer | null,
): Map<string, number> {
  const tally = (occurrences: string[]): Map<string, number> => {
    const counts = new Map<string, number>();
    for (const text of occurrences) {
      counts.set(text, (counts.get(text) ?? 0) + 1);
    }
    return counts;
  };

  const counts = tally(findPatternOccurrences(sentence));
  if (analyzer) {
    const linguistic = tally(findLinguisticOccurrences(sentence, analyzer));
    for (const [text, count] of linguistic) {
      counts.set(text, Math.max(counts.get(text) ?? 0, count));
    }
  }
  return counts;
}

function collectCandidates(
  page: NormalizedPage,
  analyzer: LinguisticAnalyzer | null,
): Candidate[] {
  if (typeof page.text !== "string" || page.text.length === 0) {
    logger.debug("Page has no text, no candidates", {
      pageNumber: page.pageNumber,
    });
    return [];
  }

  const byText = new Map<string, Candidate>();
  for (const sentence of splitSentences(page.text)) {
    const counts = countSentenceOccurrences(sentence.text, analyzer);
    for (const [rawText, count] of counts) {
      const existing = byText.get(rawText);
      if (existing) {
        existing.frequency += count;
        continue;
      }
      const inSentence = Math.max(0, sentence.text.indexOf(rawText));
      byText.set(rawText, {
        rawText,
        sentence: boundSentence(sentence.text, inSentence, rawText.length),
        context: buildContext(
          page.text,
          sentence.start + inSentence,
          rawText.length,
        ),
        pageNumbers: [page.pageNumber],
        frequency: count,
      });
    }
  }
  return Array.from(byText.values());
}

/**
 * Candidates for a normalized page.
 *
 * The result is lazy (nothing runs until iterated) and restartable (each
 * iteration recomputes from the page). Order is deterministic: sentence
 * by sentence, pattern matches before analyzer phrases.
 *
 * @example
 * const candidates = generateCandidates({ pageNumber: 3, text });
 * for (const c of candidates) console.log(c.rawText, c.frequency);
 */
export function generateCandidates(
  page: NormalizedPage,
  options: GenerateCandidatesOptions = {},
): Iterable<Candidate> {
  const analyzer = options.analyzer ?? null;
  return {
    [Symbol.iterator]: () => collectCandidates(page, analyzer).values(),
  };
}

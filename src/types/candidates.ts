/**
 * Candidate generation type definitions
 */

/**
 * A raw term string observed on a page, with provenance.
 * Identical rawText on one page collapses into one candidate.
 */
export type Candidate = {
  rawText: string;
  /** Sentence containing the first occurrence */
  sentence: string;
  /** Bounded excerpt around the first occurrence */
  context: string;
  /** Ascending, unique */
  pageNumbers: number[];
  frequency: number;
};

/**
 * Optional part-of-speech backed phrase source (noun phrases, named entities).
 * When none is available the generator runs the pattern strategy only.
 */
export interface LinguisticAnalyzer {
  readonly name: string;
  extractPhrases(sentence: string): string[];
}

export type CandidateStrategy = "pattern" | "linguistic";

export type GenerateCandidatesOptions = {
  analyzer?: LinguisticAnalyzer | null;
};

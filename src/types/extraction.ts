/**
 * Extraction pipeline type definitions
 */

import type { CandidateStrategy, LinguisticAnalyzer } from "./candidates";
import type { SynthesizedDefinition } from "./definitions";
import type { Language, Lexicon } from "./lexicon";
import type { RuleName, ValidationProfileName } from "./validation";

/**
 * A validated, defined term with provenance across the document
 */
export type AcceptedCandidate = {
  term: string;
  termKey: string;
  frequency: number;
  pageNumbers: number[];
  sentence: string;
  contextExcerpt: string;
  definition: SynthesizedDefinition;
};

export type RejectedCandidate = {
  text: string;
  reason: string;
  /** null when the candidate was discarded before validation */
  rule: RuleName | null;
  frequency: number;
  pageNumbers: number[];
};

export type FailedPage = {
  pageNumber: number;
  error: string;
};

export type ExtractionResult = {
  accepted: AcceptedCandidate[];
  rejected: RejectedCandidate[];
  /** Rejection reason -> number of distinct rejected terms */
  rejectionCounts: Record<string, number>;
  candidatesTotal: number;
  pagesProcessed: number;
  failedPages: FailedPage[];
  /** Document deadline hit; results cover processed pages only */
  timedOut: boolean;
  strategies: CandidateStrategy[];
};

export type ExtractOptions = {
  language: Language;
  profile?: ValidationProfileName;
  /** Overrides the lexicon loaded for `language` */
  lexicon?: Lexicon;
  analyzer?: LinguisticAnalyzer | null;
  concurrency?: number;
  timeoutMs?: number;
  minFrequency?: number;
  /** Clock in ms, injectable for deadline tests */
  now?: () => number;
};

/**
 * Extraction run type definitions
 *
 * One run = one document processed end to end (extract + ingest).
 */

import type { Language } from "./lexicon";
import type { ValidationProfileName } from "./validation";

export type RunStatus = "success" | "partial" | "failure";

/**
 * Mutable counters filled in while the run executes
 */
export type RunCounters = {
  pagesTotal: number;
  pagesFailed: number;
  candidatesTotal: number;
  acceptedCount: number;
  rejectedCount: number;
  termsCreated: number;
  termsUpdated: number;
  termsUnchanged: number;
  duplicateDefinitions: number;
  ingestFailures: number;
  rejectionReasons: Record<string, number>;
};

export type RunAccumulator = {
  counters: RunCounters;
  /** Set when the run produced partial results (timeout) */
  partial: boolean;
};

export type ExtractionRunInput = {
  documentId: string;
  language: Language;
  profile: ValidationProfileName;
};

export type ExtractionRunUpdate = {
  finishedAt: string;
  status: RunStatus;
  counters: RunCounters;
};

/**
 * Persisted run (extraction_runs row, mapped)
 */
export type ExtractionRun = {
  id: number;
  documentId: string;
  language: Language;
  profile: ValidationProfileName;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus | null;
  counters: RunCounters | null;
};

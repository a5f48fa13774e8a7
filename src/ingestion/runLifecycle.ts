/**
 * Run lifecycle helpers: track extraction runs in the database
 *
 * One run = one document processed end to end (extract + ingest).
 * These helpers ensure every run is finalized (success, partial or failure).
 */

import type {
  ExtractionRunInput,
  RunAccumulator,
  RunCounters,
  RunStatus,
} from "@/types";
import {
  createExtractionRun,
  finishExtractionRun,
} from "@/db/repos/extractionRunsRepo";

/**
 * Start a new extraction run
 *
 * @returns The run ID
 */
export function startRun(input: ExtractionRunInput): number {
  return createExtractionRun(input);
}

/**
 * Finish an extraction run with status and counters
 */
export function finishRun(
  runId: number,
  status: RunStatus,
  counters: RunCounters,
): void {
  finishExtractionRun(runId, {
    finishedAt: new Date().toISOString(),
    status,
    counters,
  });
}

/**
 * Create a fresh run accumulator with zeroed counters
 */
export function createRunAccumulator(): RunAccumulator {
  return {
    counters: {
      pagesTotal: 0,
      pagesFailed: 0,
      candidatesTotal: 0,
      acceptedCount: 0,
      rejectedCount: 0,
      termsCreated: 0,
      termsUpdated: 0,
      termsUnchanged: 0,
      duplicateDefinitions: 0,
      ingestFailures: 0,
      rejectionReasons: {},
    },
    partial: false,
  };
}

/**
 * Execute a function within a run lifecycle
 *
 * Guarantees the run is finalized regardless of success or failure.
 * On success: status = "partial" if `acc.partial` was set, else "success"
 * On error: status = "failure", then rethrows the error
 *
 * Counters filled in on `acc` are persisted in the `finally` block, so
 * whatever was counted before a failure is kept.
 *
 * @param input - Document, language and profile of the run
 * @param fn - Async function to execute, receives (runId, acc)
 * @returns The result of fn
 */
export async function withRun<T>(
  input: ExtractionRunInput,
  fn: (runId: number, acc: RunAccumulator) => Promise<T>,
): Promise<T> {
  const runId = startRun(input);
  const acc = createRunAccumulator();
  let succeeded = false;

  try {
    const result = await fn(runId, acc);
    succeeded = true;
    return result;
  } finally {
    const status: RunStatus = !succeeded
      ? "failure"
      : acc.partial
        ? "partial"
        : "success";
    finishRun(runId, status, acc.counters);
  }
}

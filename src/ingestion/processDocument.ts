/**
 * Document processing: extract terms from one document and merge them
 * into the glossary, tracked as an extraction run
 */

import type {
  DocumentPage,
  ExtractOptions,
  ExtractionResult,
  IngestSummary,
  RunCounters,
} from "@/types";
import type { GlossaryStore } from "@/interfaces/glossary/glossaryStore";
import { DEFAULT_PROFILE_NAME } from "@/constants/validation";
import * as logger from "@/logger";
import { extractTerms } from "@/extraction/extractTerms";
import { ingestAcceptedCandidates } from "@/glossary/ingestTerms";
import { SqliteGlossaryStore } from "@/glossary/sqliteGlossaryStore";
import { withRun } from "./runLifecycle";

export type ProcessDocumentOptions = ExtractOptions & {
  /** Defaults to the SQLite store */
  store?: GlossaryStore;
  domainTags?: string[];
};

export type DocumentOutcome = {
  documentId: string;
  extraction: ExtractionResult;
  ingest: IngestSummary;
};

export type ProcessDocumentResult = DocumentOutcome & {
  runId: number;
};

/**
 * Copy extraction and ingest results into run counters
 */
export function fillRunCounters(
  counters: RunCounters,
  pagesTotal: number,
  outcome: DocumentOutcome,
): void {
  const { extraction, ingest } = outcome;
  counters.pagesTotal = pagesTotal;
  counters.pagesFailed = extraction.failedPages.length;
  counters.candidatesTotal = extraction.candidatesTotal;
  counters.acceptedCount = extraction.accepted.length;
  counters.rejectedCount = extraction.rejected.length;
  counters.rejectionReasons = { ...extraction.rejectionCounts };
  counters.termsCreated = ingest.created;
  counters.termsUpdated = ingest.updated;
  counters.termsUnchanged = ingest.unchanged;
  counters.duplicateDefinitions = ingest.rejectedDuplicates;
  counters.ingestFailures = ingest.failed;
}

/**
 * Extract and ingest one document without run tracking (dry runs use
 * this with an in-memory store)
 */
export async function runDocument(
  documentId: string,
  pages: readonly DocumentPage[],
  options: ProcessDocumentOptions,
): Promise<DocumentOutcome> {
  const extraction = await extractTerms(pages, options);
  const ingest = await ingestAcceptedCandidates(
    options.store ?? new SqliteGlossaryStore(),
    extraction.accepted,
    {
      documentId,
      language: options.language,
      domainTags: options.domainTags,
    },
  );
  return { documentId, extraction, ingest };
}

/**
 * Process one document inside an extraction run.
 *
 * The run ends "partial" when the document deadline cut extraction short,
 * "failure" when anything threw (the error is rethrown).
 *
 * @example
 * openDb();
 * const result = await processDocument("manual-7", pages, { language: "en" });
 * console.log(result.ingest.created, result.extraction.rejectionCounts);
 */
export async function processDocument(
  documentId: string,
  pages: readonly DocumentPage[],
  options: ProcessDocumentOptions,
): Promise<ProcessDocumentResult> {
  const log = logger.withContext({ documentId });

  return withRun(
    {
      documentId,
      language: options.language,
      profile: options.profile ?? DEFAULT_PROFILE_NAME,
    },
    async (runId, acc) => {
      const outcome = await runDocument(documentId, pages, options);
      fillRunCounters(acc.counters, pages.length, outcome);
      acc.partial = outcome.extraction.timedOut;

      log.info("Run completed", {
        runId,
        accepted: outcome.extraction.accepted.length,
        rejected: outcome.extraction.rejected.length,
        created: outcome.ingest.created,
        updated: outcome.ingest.updated,
        unchanged: outcome.ingest.unchanged,
        duplicateDefinitions: outcome.ingest.rejectedDuplicates,
        ingestFailures: outcome.ingest.failed,
        failedPages: outcome.extraction.failedPages.length,
        timedOut: outcome.extraction.timedOut,
      });

      return { ...outcome, runId };
    },
  );
}

/**
 * Glossary pipeline entrypoint: extract terms from one document and merge
 * them into the glossary database
 *
 * Usage:
 *   npm start -- <pages.json> <documentId> [--dry-run]
 *   npm run build && node dist/src/main.js <pages.json> <documentId>
 *
 * The pages file is the output of the document text extraction layer:
 *   [{ "pageNumber": 1, "text": "..." }, { "pageNumber": 2, "error": "..." }]
 *
 * --dry-run extracts and merges into an in-memory glossary; the database
 * is not touched and no extraction run is recorded.
 *
 * Environment variables:
 *   - DB_PATH: SQLite database file (optional, defaults to data/glossary.db)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - GLOSSARY_LANGUAGE: Document language (en|de, defaults to en)
 *   - VALIDATION_PROFILE: strict|default|lenient|technical|standards|academic
 *   - PAGE_CONCURRENCY: Pages processed in parallel (defaults to 4)
 *   - DOCUMENT_TIMEOUT_MS: Per-document deadline (defaults to 30000)
 *   - MIN_TERM_FREQUENCY: Minimum occurrences to accept a term (defaults to 1)
 */

import "dotenv/config";
import { readFileSync } from "fs";
import * as logger from "@/logger";
import { loadPipelineConfig } from "@/config/env";
import { openDb, closeDb, migrateDb } from "@/db";
import { loadLinguisticAnalyzer } from "@/extraction/analyzers/compromiseAnalyzer";
import { InMemoryGlossaryStore } from "@/glossary/inMemoryGlossaryStore";
import { processDocument, runDocument } from "@/ingestion/processDocument";
import type { DocumentOutcome } from "@/ingestion/processDocument";
import { parsePages } from "@/utils/pageFileParsing";

type CliArgs = {
  pagesFile: string;
  documentId: string;
  dryRun: boolean;
};

function parseArgs(argv: readonly string[]): CliArgs | null {
  const dryRun = argv.includes("--dry-run");
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  const [pagesFile, documentId] = positional;
  if (!pagesFile || !documentId) {
    return null;
  }
  return { pagesFile, documentId, dryRun };
}

function logOutcome(outcome: DocumentOutcome): void {
  const { extraction, ingest } = outcome;
  logger.info("Document finished", {
    documentId: outcome.documentId,
    strategies: extraction.strategies,
    candidates: extraction.candidatesTotal,
    accepted: extraction.accepted.length,
    rejected: extraction.rejected.length,
    rejectionCounts: extraction.rejectionCounts,
    created: ingest.created,
    updated: ingest.updated,
    unchanged: ingest.unchanged,
    failed: ingest.failed,
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error("Usage: main <pages.json> <documentId> [--dry-run]");
    process.exit(1);
  }

  const config = loadPipelineConfig();
  const pages = parsePages(JSON.parse(readFileSync(args.pagesFile, "utf-8")));
  const analyzer = await loadLinguisticAnalyzer();

  logger.info("Processing document", {
    documentId: args.documentId,
    pages: pages.length,
    language: config.language,
    profile: config.profile,
    dryRun: args.dryRun,
  });

  const options = {
    language: config.language,
    profile: config.profile,
    analyzer,
    concurrency: config.pageConcurrency,
    timeoutMs: config.documentTimeoutMs,
    minFrequency: config.minFrequency,
  };

  if (args.dryRun) {
    const store = new InMemoryGlossaryStore();
    const outcome = await runDocument(args.documentId, pages, {
      ...options,
      store,
    });
    logOutcome(outcome);
    for (const term of store.list()) {
      const primary = term.definitions.find((d) => d.isPrimary);
      console.log(`${term.term}\t${primary?.text ?? ""}`);
    }
    return;
  }

  const db = openDb();
  try {
    migrateDb(db);
    const result = await processDocument(args.documentId, pages, options);
    logOutcome(result);
    if (result.extraction.timedOut) {
      logger.warn("Document timed out - run recorded as partial", {
        runId: result.runId,
      });
    }
  } finally {
    closeDb();
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});

/**
 * Extraction runs repository
 *
 * Data access layer for extraction_runs table.
 */

import type {
  ExtractionRun,
  ExtractionRunInput,
  ExtractionRunRow,
  ExtractionRunUpdate,
  RunCounters,
  RunStatus,
  ValidationProfileName,
} from "@/types";
import { parseLanguage } from "@/utils/language";
import { VALIDATION_PROFILES } from "@/constants/validation";
import { getDb } from "../connection";

const RUN_STATUSES: readonly RunStatus[] = ["success", "partial", "failure"];

function toProfileName(value: string): ValidationProfileName {
  const profile = Object.values(VALIDATION_PROFILES).find(
    (p) => p.name === value,
  );
  if (!profile) {
    throw new Error(`Unknown validation profile in extraction_runs: ${value}`);
  }
  return profile.name;
}

function toStatus(value: string | null): RunStatus | null {
  return RUN_STATUSES.find((s) => s === value) ?? null;
}

function parseReasons(json: string | null): Record<string, number> {
  if (!json) {
    return {};
  }
  const parsed: unknown = JSON.parse(json);
  const reasons: Record<string, number> = {};
  if (typeof parsed === "object" && parsed !== null) {
    for (const [reason, count] of Object.entries(parsed)) {
      if (typeof count === "number") {
        reasons[reason] = count;
      }
    }
  }
  return reasons;
}

function mapCounters(row: ExtractionRunRow): RunCounters | null {
  if (row.finished_at === null) {
    return null;
  }
  return {
    pagesTotal: row.pages_total ?? 0,
    pagesFailed: row.pages_failed ?? 0,
    candidatesTotal: row.candidates_total ?? 0,
    acceptedCount: row.accepted_count ?? 0,
    rejectedCount: row.rejected_count ?? 0,
    termsCreated: row.terms_created ?? 0,
    termsUpdated: row.terms_updated ?? 0,
    termsUnchanged: row.terms_unchanged ?? 0,
    duplicateDefinitions: row.duplicate_definitions ?? 0,
    ingestFailures: row.ingest_failures ?? 0,
    rejectionReasons: parseReasons(row.rejection_reasons_json),
  };
}

function mapRun(row: ExtractionRunRow): ExtractionRun {
  return {
    id: row.id,
    documentId: row.document_id,
    language: parseLanguage(row.language, "extraction_runs"),
    profile: toProfileName(row.profile),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    status: toStatus(row.status),
    counters: mapCounters(row),
  };
}

/**
 * Create a new extraction run
 * Returns the run id
 */
export function createExtractionRun(input: ExtractionRunInput): number {
  const result = getDb()
    .prepare(
      `
    INSERT INTO extraction_runs (document_id, language, profile)
    VALUES (?, ?, ?)
  `,
    )
    .run(input.documentId, input.language, input.profile);

  return Number(result.lastInsertRowid);
}

/**
 * Finish an extraction run with its status and counters
 */
export function finishExtractionRun(
  runId: number,
  update: ExtractionRunUpdate,
): void {
  const { counters } = update;
  getDb()
    .prepare(
      `
    UPDATE extraction_runs SET
      finished_at = ?, status = ?,
      pages_total = ?, pages_failed = ?, candidates_total = ?,
      accepted_count = ?, rejected_count = ?,
      terms_created = ?, terms_updated = ?, terms_unchanged = ?,
      duplicate_definitions = ?, ingest_failures = ?,
      rejection_reasons_json = ?
    WHERE id = ?
  `,
    )
    .run(
      update.finishedAt,
      update.status,
      counters.pagesTotal,
      counters.pagesFailed,
      counters.candidatesTotal,
      counters.acceptedCount,
      counters.rejectedCount,
      counters.termsCreated,
      counters.termsUpdated,
      counters.termsUnchanged,
      counters.duplicateDefinitions,
      counters.ingestFailures,
      JSON.stringify(counters.rejectionReasons),
      runId,
    );
}

/**
 * Get run by id
 */
export function getExtractionRunById(id: number): ExtractionRun | undefined {
  const row = getDb()
    .prepare<[number], ExtractionRunRow>(
      "SELECT * FROM extraction_runs WHERE id = ?",
    )
    .get(id);
  return row ? mapRun(row) : undefined;
}

/**
 * Runs for a document, most recent first
 */
export function listExtractionRunsByDocument(
  documentId: string,
): ExtractionRun[] {
  return getDb()
    .prepare<[string], ExtractionRunRow>(
      "SELECT * FROM extraction_runs WHERE document_id = ? ORDER BY id DESC",
    )
    .all(documentId)
    .map(mapRun);
}

/**
 * Database row type definitions
 *
 * Raw row shapes as returned by better-sqlite3.
 * Aligned with schema in migrations/0001_init_glossary.sql
 */

export type GlossaryTermRow = {
  id: number;
  term: string;
  term_key: string;
  language: string;
  domain_tags_json: string;
  created_at: string;
  updated_at: string;
};

export type TermDefinitionRow = {
  id: number;
  term_id: number;
  position: number;
  text: string;
  source_document_id: string | null;
  is_primary: number;
  is_context_snippet: number;
};

export type TermDocumentReferenceRow = {
  id: number;
  term_id: number;
  position: number;
  document_id: string;
  frequency: number;
  page_numbers_json: string;
  context_excerpt: string;
};

export type ExtractionRunRow = {
  id: number;
  document_id: string;
  language: string;
  profile: string;
  started_at: string;
  finished_at: string | null;
  status: string | null;
  pages_total: number | null;
  pages_failed: number | null;
  candidates_total: number | null;
  accepted_count: number | null;
  rejected_count: number | null;
  terms_created: number | null;
  terms_updated: number | null;
  terms_unchanged: number | null;
  duplicate_definitions: number | null;
  ingest_failures: number | null;
  rejection_reasons_json: string | null;
};

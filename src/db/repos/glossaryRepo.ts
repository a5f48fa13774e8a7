/**
 * Glossary repository
 *
 * Data access layer for glossary_terms, term_definitions and
 * term_document_references. A term aggregate is always read and written
 * whole; nested rows keep their list order through `position`.
 */

import type {
  DefinitionEntry,
  DocumentReference,
  GlossaryTerm,
  GlossaryTermRow,
  Language,
  TermDefinitionRow,
  TermDocumentReferenceRow,
} from "@/types";
import { parseLanguage } from "@/utils/language";
import { getDb } from "../connection";

function parseJsonArray<T>(
  json: string,
  isItem: (value: unknown) => value is T,
): T[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter(isItem) : [];
}

const isString = (value: unknown): value is string => typeof value === "string";
const isNumber = (value: unknown): value is number => typeof value === "number";

function mapDefinition(row: TermDefinitionRow): DefinitionEntry {
  return {
    text: row.text,
    sourceDocumentId: row.source_document_id,
    isPrimary: row.is_primary === 1,
    isContextSnippet: row.is_context_snippet === 1,
  };
}

function mapReference(row: TermDocumentReferenceRow): DocumentReference {
  return {
    documentId: row.document_id,
    frequency: row.frequency,
    pageNumbers: parseJsonArray(row.page_numbers_json, isNumber),
    contextExcerpt: row.context_excerpt,
  };
}

function loadAggregate(row: GlossaryTermRow): GlossaryTerm {
  const db = getDb();

  const definitions = db
    .prepare<[number], TermDefinitionRow>(
      "SELECT * FROM term_definitions WHERE term_id = ? ORDER BY position",
    )
    .all(row.id)
    .map(mapDefinition);

  const documentReferences = db
    .prepare<[number], TermDocumentReferenceRow>(
      "SELECT * FROM term_document_references WHERE term_id = ? ORDER BY position",
    )
    .all(row.id)
    .map(mapReference);

  return {
    id: row.id,
    term: row.term,
    termKey: row.term_key,
    language: parseLanguage(row.language, "glossary_terms"),
    definitions,
    domainTags: parseJsonArray(row.domain_tags_json, isString),
    documentReferences,
  };
}

function writeChildren(termId: number, term: GlossaryTerm): void {
  const db = getDb();

  db.prepare("DELETE FROM term_definitions WHERE term_id = ?").run(termId);
  db.prepare("DELETE FROM term_document_references WHERE term_id = ?").run(
    termId,
  );

  const insertDefinition = db.prepare(`
    INSERT INTO term_definitions
      (term_id, position, text, source_document_id, is_primary, is_context_snippet)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  term.definitions.forEach((d, position) => {
    insertDefinition.run(
      termId,
      position,
      d.text,
      d.sourceDocumentId,
      d.isPrimary ? 1 : 0,
      d.isContextSnippet ? 1 : 0,
    );
  });

  const insertReference = db.prepare(`
    INSERT INTO term_document_references
      (term_id, position, document_id, frequency, page_numbers_json, context_excerpt)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  term.documentReferences.forEach((r, position) => {
    insertReference.run(
      termId,
      position,
      r.documentId,
      r.frequency,
      JSON.stringify(r.pageNumbers),
      r.contextExcerpt,
    );
  });
}

/**
 * Get a term aggregate by case-insensitive key
 */
export function getGlossaryTermByKey(
  termKey: string,
  language: Language,
): GlossaryTerm | undefined {
  const row = getDb()
    .prepare<[string, string], GlossaryTermRow>(
      "SELECT * FROM glossary_terms WHERE term_key = ? AND language = ?",
    )
    .get(termKey, language);
  return row ? loadAggregate(row) : undefined;
}

/**
 * Get a term aggregate by id
 */
export function getGlossaryTermById(id: number): GlossaryTerm | undefined {
  const row = getDb()
    .prepare<[number], GlossaryTermRow>(
      "SELECT * FROM glossary_terms WHERE id = ?",
    )
    .get(id);
  return row ? loadAggregate(row) : undefined;
}

/**
 * Insert a new term aggregate
 *
 * @returns The new term id
 * @throws UNIQUE constraint error if (term_key, language) already exists
 */
export function insertGlossaryTerm(term: GlossaryTerm): number {
  const db = getDb();
  const insert = db.transaction((): number => {
    const result = db
      .prepare(
        `
      INSERT INTO glossary_terms (term, term_key, language, domain_tags_json)
      VALUES (?, ?, ?, ?)
    `,
      )
      .run(
        term.term,
        term.termKey,
        term.language,
        JSON.stringify(term.domainTags),
      );
    const termId = Number(result.lastInsertRowid);
    writeChildren(termId, term);
    return termId;
  });
  return insert();
}

/**
 * Replace a stored term aggregate (definitions and references rewritten)
 *
 * @throws Error if no term exists with the given id
 */
export function replaceGlossaryTerm(id: number, term: GlossaryTerm): void {
  const db = getDb();
  const replace = db.transaction((): void => {
    const result = db
      .prepare(
        `
      UPDATE glossary_terms
      SET term = ?, term_key = ?, language = ?, domain_tags_json = ?,
          updated_at = datetime('now')
      WHERE id = ?
    `,
      )
      .run(
        term.term,
        term.termKey,
        term.language,
        JSON.stringify(term.domainTags),
        id,
      );
    if (result.changes === 0) {
      throw new Error(`Glossary term ${id} does not exist`);
    }
    writeChildren(id, term);
  });
  replace();
}

/**
 * All terms of a language, ordered by key
 */
export function listGlossaryTerms(language: Language): GlossaryTerm[] {
  return getDb()
    .prepare<[string], GlossaryTermRow>(
      "SELECT * FROM glossary_terms WHERE language = ? ORDER BY term_key",
    )
    .all(language)
    .map(loadAggregate);
}

/**
 * Terms referenced by a document
 */
export function listGlossaryTermsByDocument(
  documentId: string,
): GlossaryTerm[] {
  return getDb()
    .prepare<[string], GlossaryTermRow>(
      `
    SELECT t.* FROM glossary_terms t
    JOIN term_document_references r ON r.term_id = t.id
    WHERE r.document_id = ?
    ORDER BY t.term_key
  `,
    )
    .all(documentId)
    .map(loadAggregate);
}

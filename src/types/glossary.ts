/**
 * Glossary aggregate type definitions
 */

import type { Language } from "./lexicon";

/**
 * One definition of a term. Insertion order is preserved; at most one
 * entry per term is primary.
 */
export type DefinitionEntry = {
  text: string;
  sourceDocumentId: string | null;
  isPrimary: boolean;
  /** Fallback context snippet rather than an extracted definition */
  isContextSnippet: boolean;
};

/**
 * Where a term was observed. At most one reference per document.
 */
export type DocumentReference = {
  documentId: string;
  frequency: number;
  pageNumbers: number[];
  contextExcerpt: string;
};

/**
 * Aggregate root. `id` is null until the store has persisted the term.
 * Identity is (termKey, language) where termKey is the case-insensitive key.
 */
export type GlossaryTerm = {
  id: number | null;
  term: string;
  termKey: string;
  language: Language;
  definitions: DefinitionEntry[];
  domainTags: string[];
  documentReferences: DocumentReference[];
};

/**
 * One accepted term occurrence set from one document, ready to merge
 */
export type TermIngestInput = {
  term: string;
  language: Language;
  definition: {
    text: string;
    isContextSnippet: boolean;
  };
  documentId: string;
  frequency: number;
  pageNumbers: number[];
  contextExcerpt: string;
  domainTags?: string[];
  /** When false, a new document reference never contributes a definition */
  isFirstDefinitionForDocument?: boolean;
};

export type MergeOutcome =
  | "created"
  | "reference_added"
  | "reference_updated"
  | "unchanged";

export type MergeResult = {
  term: GlossaryTerm;
  outcome: MergeOutcome;
  definitionAdded: boolean;
  /** New definition text matched an existing entry and was not appended */
  duplicateDefinition: boolean;
};

export type IngestSummary = {
  created: number;
  updated: number;
  unchanged: number;
  rejectedDuplicates: number;
  failed: number;
};

export type IngestOptions = {
  documentId: string;
  language: Language;
  domainTags?: string[];
  concurrency?: number;
};

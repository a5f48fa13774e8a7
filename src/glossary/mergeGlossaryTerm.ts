/**
 * Glossary term merge logic
 *
 * Pure merge of one ingest input into an existing (or absent) term
 * aggregate. No store access, no side effects: the input aggregate is
 * never mutated, a new one is returned.
 */

import type {
  DefinitionEntry,
  DocumentReference,
  GlossaryTerm,
  MergeResult,
  TermIngestInput,
} from "@/types";
import { DEFAULT_DOMAIN_TAGS } from "@/constants/glossary";
import { toTermKey } from "@/utils/text/termKey";
import { DefinitionNotFoundError } from "./errors";

function samePages(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((page, i) => page === b[i]);
}

function normalizePages(pages: readonly number[]): number[] {
  return Array.from(new Set(pages)).sort((a, b) => a - b);
}

function sameReference(a: DocumentReference, b: DocumentReference): boolean {
  return (
    a.frequency === b.frequency &&
    a.contextExcerpt === b.contextExcerpt &&
    samePages(a.pageNumbers, b.pageNumbers)
  );
}

/**
 * Union of existing and incoming tags, existing order first
 */
function mergeTags(
  existing: readonly string[],
  incoming: readonly string[],
): string[] {
  const tags = [...existing];
  for (const tag of incoming) {
    if (!tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags;
}

function toReference(input: TermIngestInput): DocumentReference {
  return {
    documentId: input.documentId,
    frequency: input.frequency,
    pageNumbers: normalizePages(input.pageNumbers),
    contextExcerpt: input.contextExcerpt,
  };
}

function cloneTerm(term: GlossaryTerm): GlossaryTerm {
  return {
    ...term,
    definitions: term.definitions.map((d) => ({ ...d })),
    domainTags: [...term.domainTags],
    documentReferences: term.documentReferences.map((r) => ({
      ...r,
      pageNumbers: [...r.pageNumbers],
    })),
  };
}

/**
 * Merge one ingest input into a term aggregate
 *
 * Algorithm:
 * 1. Absent term: create it with the input definition as the single
 *    primary definition and one document reference
 * 2. Reference for the document exists (re-processing): replace its
 *    frequency, pages and excerpt in place; definitions are untouched.
 *    Outcome "unchanged" when nothing differs
 * 3. New document: append the reference, then append the definition as
 *    non-primary unless the text equals an existing definition (reported
 *    as duplicateDefinition) or isFirstDefinitionForDocument is false
 * 4. The primary flag is only ever set at creation
 *
 * Domain tags are unioned; a new tag alone makes the outcome
 * "reference_updated" for an existing reference.
 *
 * @param existing - Stored aggregate, or undefined when the term is new
 * @param input - Accepted term from one document
 */
export function mergeGlossaryTerm(
  existing: GlossaryTerm | undefined,
  input: TermIngestInput,
): MergeResult {
  const incomingTags = input.domainTags ?? DEFAULT_DOMAIN_TAGS;
  const definitionText = input.definition.text.trim();

  if (!existing) {
    const definition: DefinitionEntry = {
      text: definitionText,
      sourceDocumentId: input.documentId,
      isPrimary: true,
      isContextSnippet: input.definition.isContextSnippet,
    };
    return {
      term: {
        id: null,
        term: input.term,
        termKey: toTermKey(input.term),
        language: input.language,
        definitions: [definition],
        domainTags: mergeTags([], incomingTags),
        documentReferences: [toReference(input)],
      },
      outcome: "created",
      definitionAdded: true,
      duplicateDefinition: false,
    };
  }

  const term = cloneTerm(existing);
  const tags = mergeTags(term.domainTags, incomingTags);
  const tagsChanged = tags.length !== term.domainTags.length;
  term.domainTags = tags;

  const reference = toReference(input);
  const index = term.documentReferences.findIndex(
    (r) => r.documentId === input.documentId,
  );

  if (index >= 0) {
    const changed = !sameReference(term.documentReferences[index], reference);
    term.documentReferences[index] = reference;
    return {
      term,
      outcome: changed || tagsChanged ? "reference_updated" : "unchanged",
      definitionAdded: false,
      duplicateDefinition: false,
    };
  }

  term.documentReferences.push(reference);

  if (input.isFirstDefinitionForDocument === false) {
    return {
      term,
      outcome: "reference_added",
      definitionAdded: false,
      duplicateDefinition: false,
    };
  }

  const duplicate = term.definitions.some((d) => d.text === definitionText);
  if (!duplicate) {
    term.definitions.push({
      text: definitionText,
      sourceDocumentId: input.documentId,
      isPrimary: false,
      isContextSnippet: input.definition.isContextSnippet,
    });
  }
  return {
    term,
    outcome: "reference_added",
    definitionAdded: !duplicate,
    duplicateDefinition: duplicate,
  };
}

/**
 * Move the primary flag to the definition at `index`
 *
 * The only way the primary definition changes after creation.
 *
 * @throws {DefinitionNotFoundError} If no definition exists at `index`
 */
export function withPrimaryDefinition(
  term: GlossaryTerm,
  index: number,
): GlossaryTerm {
  if (
    !Number.isInteger(index) ||
    index < 0 ||
    index >= term.definitions.length
  ) {
    throw new DefinitionNotFoundError(term.termKey, index);
  }
  const updated = cloneTerm(term);
  updated.definitions = updated.definitions.map((d, i) => ({
    ...d,
    isPrimary: i === index,
  }));
  return updated;
}

/**
 * True when at most one definition is primary
 */
export function hasSinglePrimary(term: GlossaryTerm): boolean {
  return term.definitions.filter((d) => d.isPrimary).length <= 1;
}

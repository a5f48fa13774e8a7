/**
 * Unit tests for glossary term merge logic
 *
 * Pure function: no store, no DB, no network
 */

import { describe, it, expect } from "vitest";
import type { GlossaryTerm, TermIngestInput } from "@/types";
import {
  DefinitionNotFoundError,
  hasSinglePrimary,
  mergeGlossaryTerm,
  withPrimaryDefinition,
} from "@/glossary";

const PATTERN_DEFINITION =
  "Pressure Transmitter is a device that measures pressure.";
const SNIPPET_DEFINITION =
  "Found in context (Page 2): Check the Pressure Transmitter weekly.";

function makeInput(overrides: Partial<TermIngestInput> = {}): TermIngestInput {
  return {
    term: "Pressure Transmitter",
    language: "en",
    definition: { text: PATTERN_DEFINITION, isContextSnippet: false },
    documentId: "doc-a",
    frequency: 2,
    pageNumbers: [3, 1, 3],
    contextExcerpt: "...the Pressure Transmitter is a device...",
    ...overrides,
  };
}

function storedTerm(): GlossaryTerm {
  return { ...mergeGlossaryTerm(undefined, makeInput()).term, id: 1 };
}

describe("mergeGlossaryTerm", () => {
  it("should create a term with one primary definition", () => {
    const result = mergeGlossaryTerm(undefined, makeInput());

    expect(result).toEqual({
      term: {
        id: null,
        term: "Pressure Transmitter",
        termKey: "pressure transmitter",
        language: "en",
        definitions: [
          {
            text: PATTERN_DEFINITION,
            sourceDocumentId: "doc-a",
            isPrimary: true,
            isContextSnippet: false,
          },
        ],
        domainTags: ["extracted"],
        documentReferences: [
          {
            documentId: "doc-a",
            frequency: 2,
            pageNumbers: [1, 3],
            contextExcerpt: "...the Pressure Transmitter is a device...",
          },
        ],
      },
      outcome: "created",
      definitionAdded: true,
      duplicateDefinition: false,
    });
  });

  it("should add a reference and a non-primary definition for a new document", () => {
    const result = mergeGlossaryTerm(
      storedTerm(),
      makeInput({
        documentId: "doc-b",
        definition: { text: SNIPPET_DEFINITION, isContextSnippet: true },
        frequency: 1,
        pageNumbers: [2],
      }),
    );

    expect(result.outcome).toBe("reference_added");
    expect(result.definitionAdded).toBe(true);
    expect(result.term.id).toBe(1);
    expect(result.term.definitions).toEqual([
      {
        text: PATTERN_DEFINITION,
        sourceDocumentId: "doc-a",
        isPrimary: true,
        isContextSnippet: false,
      },
      {
        text: SNIPPET_DEFINITION,
        sourceDocumentId: "doc-b",
        isPrimary: false,
        isContextSnippet: true,
      },
    ]);
    expect(result.term.documentReferences.map((r) => r.documentId)).toEqual([
      "doc-a",
      "doc-b",
    ]);
  });

  it("should report an identical re-ingest as unchanged", () => {
    const existing = storedTerm();
    const snapshot = structuredClone(existing);

    const result = mergeGlossaryTerm(existing, makeInput());

    expect(result.outcome).toBe("unchanged");
    expect(result.term).toEqual(snapshot);
    expect(existing).toEqual(snapshot);
  });

  it("should replace the reference when a document is re-processed", () => {
    const result = mergeGlossaryTerm(
      storedTerm(),
      makeInput({
        frequency: 5,
        pageNumbers: [4],
        definition: { text: SNIPPET_DEFINITION, isContextSnippet: true },
      }),
    );

    expect(result.outcome).toBe("reference_updated");
    expect(result.definitionAdded).toBe(false);
    expect(result.term.definitions).toHaveLength(1);
    expect(result.term.documentReferences).toEqual([
      {
        documentId: "doc-a",
        frequency: 5,
        pageNumbers: [4],
        contextExcerpt: "...the Pressure Transmitter is a device...",
      },
    ]);
  });

  it("should not append a definition whose text already exists", () => {
    const result = mergeGlossaryTerm(
      storedTerm(),
      makeInput({
        documentId: "doc-b",
        definition: { text: `  ${PATTERN_DEFINITION} `, isContextSnippet: false },
      }),
    );

    expect(result.outcome).toBe("reference_added");
    expect(result.duplicateDefinition).toBe(true);
    expect(result.definitionAdded).toBe(false);
    expect(result.term.definitions).toHaveLength(1);
    expect(result.term.documentReferences).toHaveLength(2);
  });

  it("should not add a definition when the document already contributed one", () => {
    const result = mergeGlossaryTerm(
      storedTerm(),
      makeInput({
        documentId: "doc-b",
        definition: { text: SNIPPET_DEFINITION, isContextSnippet: true },
        isFirstDefinitionForDocument: false,
      }),
    );

    expect(result.outcome).toBe("reference_added");
    expect(result.definitionAdded).toBe(false);
    expect(result.term.definitions).toHaveLength(1);
  });

  it("should union domain tags", () => {
    const result = mergeGlossaryTerm(
      storedTerm(),
      makeInput({ domainTags: ["safety", "extracted"] }),
    );

    expect(result.outcome).toBe("reference_updated");
    expect(result.term.domainTags).toEqual(["extracted", "safety"]);
  });

  it("should keep a single primary definition across merges", () => {
    let term = storedTerm();
    for (const documentId of ["doc-b", "doc-c", "doc-d"]) {
      term = mergeGlossaryTerm(
        term,
        makeInput({
          documentId,
          definition: {
            text: `Found in context (Page 1): ${documentId} mentions it.`,
            isContextSnippet: true,
          },
        }),
      ).term;
    }

    expect(term.definitions).toHaveLength(4);
    expect(term.definitions.map((d) => d.isPrimary)).toEqual([
      true,
      false,
      false,
      false,
    ]);
    expect(hasSinglePrimary(term)).toBe(true);
  });
});

describe("withPrimaryDefinition", () => {
  const twoDefinitions = mergeGlossaryTerm(
    storedTerm(),
    makeInput({
      documentId: "doc-b",
      definition: { text: SNIPPET_DEFINITION, isContextSnippet: true },
    }),
  ).term;

  it("should move the primary flag", () => {
    const updated = withPrimaryDefinition(twoDefinitions, 1);
    expect(updated.definitions.map((d) => d.isPrimary)).toEqual([false, true]);
    expect(twoDefinitions.definitions.map((d) => d.isPrimary)).toEqual([
      true,
      false,
    ]);
  });

  it("should throw for an index without a definition", () => {
    expect(() => withPrimaryDefinition(twoDefinitions, 2)).toThrow(
      DefinitionNotFoundError,
    );
    expect(() => withPrimaryDefinition(twoDefinitions, -1)).toThrow(
      'Term "pressure transmitter" has no definition at index -1',
    );
  });
});

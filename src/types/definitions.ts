/**
 * Definition synthesis type definitions
 */

export type DefinitionPattern =
  | "is_are"
  | "defining_verb"
  | "colon"
  | "parenthetical"
  | "called";

/**
 * A definition derived from context. `context_snippet` marks the
 * lower-quality fallback (literal sentence annotated with pages).
 */
export type SynthesizedDefinition =
  | { kind: "pattern"; pattern: DefinitionPattern; text: string }
  | { kind: "context_snippet"; pattern: null; text: string };

export type DefinitionInput = {
  term: string;
  sentence: string;
  context: string;
  pageNumbers: number[];
  /** Further sentences mentioning the term, tried after `sentence` */
  additionalSentences?: string[];
};

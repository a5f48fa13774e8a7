/**
 * Definition synthesis
 *
 * Derives a definition for an accepted term from the sentences it was
 * found in. Defining patterns are tried first; when none yields a clause
 * of at least MIN_DEFINITION_CLAUSE_LENGTH characters, the result is a
 * context snippet annotated with the page numbers, flagged as such.
 */

import type {
  DefinitionInput,
  DefinitionPattern,
  SynthesizedDefinition,
} from "@/types";
import {
  CONTEXT_SNIPPET_PREFIX,
  DEFINING_VERBS,
  MAX_LISTED_PAGES,
  MAX_SNIPPET_LENGTH,
  MIN_DEFINITION_CLAUSE_LENGTH,
  NO_CONTEXT_PREFIX,
} from "@/constants/definitions";

type ClauseMatch = {
  pattern: DefinitionPattern;
  text: string;
};

type PatternMatcher = (term: string, sentence: string) => ClauseMatch | null;

const CLAUSE_END = String.raw`(?:[.;!?](?=\s|$)|$)`;
const TRAILING_PUNCTUATION_PATTERN = /[\s.,;:!?]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * The term as a whole word, matched case-insensitively
 */
function termSource(term: string): string {
  return String.raw`(?<![\p{L}\p{N}])${escapeRegExp(term)}(?![\p{L}\p{N}])`;
}

function cleanClause(clause: string): string | null {
  const cleaned = clause.trim().replace(TRAILING_PUNCTUATION_PATTERN, "");
  return cleaned.length >= MIN_DEFINITION_CLAUSE_LENGTH ? cleaned : null;
}

const VERB_ALTERNATION = DEFINING_VERBS.map((verb) =>
  verb.replace(/ /g, String.raw`\s+`),
).join("|");

const isAre: PatternMatcher = (term, sentence) => {
  const match = new RegExp(
    `${termSource(term)}\\s+(is|are)\\s+(.+?)${CLAUSE_END}`,
    "iu",
  ).exec(sentence);
  const clause = match ? cleanClause(match[2]) : null;
  return match && clause
    ? {
        pattern: "is_are",
        text: `${term} ${match[1].toLowerCase()} ${clause}.`,
      }
    : null;
};

const definingVerb: PatternMatcher = (term, sentence) => {
  const match = new RegExp(
    `${termSource(term)}\\s+(${VERB_ALTERNATION})\\s+(.+?)${CLAUSE_END}`,
    "iu",
  ).exec(sentence);
  const clause = match ? cleanClause(match[2]) : null;
  return match && clause
    ? {
        pattern: "defining_verb",
        text: `${term} ${match[1].toLowerCase().replace(/\s+/g, " ")} ${clause}.`,
      }
    : null;
};

const colon: PatternMatcher = (term, sentence) => {
  const match = new RegExp(
    `${termSource(term)}\\s*:\\s+(.+?)${CLAUSE_END}`,
    "iu",
  ).exec(sentence);
  const clause = match ? cleanClause(match[1]) : null;
  return clause ? { pattern: "colon", text: `${term}: ${clause}.` } : null;
};

const parenthetical: PatternMatcher = (term, sentence) => {
  const match = new RegExp(`${termSource(term)}\\s*\\(([^()]+)\\)`, "iu").exec(
    sentence,
  );
  const clause = match ? cleanClause(match[1]) : null;
  return clause ? { pattern: "parenthetical", text: `${term}: ${clause}.` } : null;
};

/**
 * "<X> is called <Term>", "<X>, known as the <Term>"
 */
const called: PatternMatcher = (term, sentence) => {
  const match = new RegExp(
    String.raw`^(.+?),?\s+(?:(?:is|are)\s+)?(?:called|known\s+as|termed)\s+(?:(?:a|an|the)\s+)?` +
      termSource(term),
    "iu",
  ).exec(sentence);
  const clause = match ? cleanClause(match[1]) : null;
  return clause ? { pattern: "called", text: `${term}: ${clause}.` } : null;
};

const MATCHERS: readonly PatternMatcher[] = [
  isAre,
  definingVerb,
  colon,
  parenthetical,
  called,
];

/**
 * First defining clause found for the term, trying every pattern over
 * every sentence before falling back to the next pattern
 *
 * @example
 * extractDefiningClause("Pressure Transmitter", [
 *   "The Pressure Transmitter is a device that measures pressure.",
 * ]);
 * // { pattern: "is_are", text: "Pressure Transmitter is a device that measures pressure." }
 */
export function extractDefiningClause(
  term: string,
  sentences: readonly string[],
): ClauseMatch | null {
  for (const matcher of MATCHERS) {
    for (const sentence of sentences) {
      const found = matcher(term, sentence);
      if (found) {
        return found;
      }
    }
  }
  return null;
}

/**
 * "(Page 3)", "(Pages 1, 2, 3)", "(Pages 1, 2, 3, +2 more)"; "" for none
 */
export function formatPageAnnotation(pageNumbers: readonly number[]): string {
  if (pageNumbers.length === 0) {
    return "";
  }
  if (pageNumbers.length === 1) {
    return `(Page ${pageNumbers[0]})`;
  }
  const listed = pageNumbers.slice(0, MAX_LISTED_PAGES).join(", ");
  const rest = pageNumbers.length - MAX_LISTED_PAGES;
  return rest > 0 ? `(Pages ${listed}, +${rest} more)` : `(Pages ${listed})`;
}

/**
 * Cuts text to `max` characters at a word boundary, adding "..."
 */
export function truncateAtWord(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  const cut = text.slice(0, max - 3);
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd()}...`;
}

/**
 * Definition for an accepted term.
 *
 * @example
 * synthesizeDefinition({
 *   term: "Stirrer",
 *   sentence: "Turn on the Stirrer before heating.",
 *   context: "",
 *   pageNumbers: [4],
 * });
 * // { kind: "context_snippet", pattern: null,
 * //   text: "Found in context (Page 4): Turn on the Stirrer before heating." }
 */
export function synthesizeDefinition(
  input: DefinitionInput,
): SynthesizedDefinition {
  const sentences = [input.sentence, ...(input.additionalSentences ?? [])]
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  const found = extractDefiningClause(input.term, sentences);
  if (found) {
    return { kind: "pattern", pattern: found.pattern, text: found.text };
  }

  const source = sentences[0] ?? input.context.trim();
  if (source.length === 0) {
    return {
      kind: "context_snippet",
      pattern: null,
      text: `${NO_CONTEXT_PREFIX}: ${input.term}`,
    };
  }

  const annotation = formatPageAnnotation(input.pageNumbers);
  const label = annotation
    ? `${CONTEXT_SNIPPET_PREFIX} ${annotation}`
    : CONTEXT_SNIPPET_PREFIX;
  return {
    kind: "context_snippet",
    pattern: null,
    text: `${label}: ${truncateAtWord(source, MAX_SNIPPET_LENGTH)}`,
  };
}

/**
 * Validation rules
 *
 * Each rule is an independent named predicate over a preprocessed term.
 * RULES lists them in evaluation order; order only decides which reason
 * is reported, never whether a term is accepted.
 */

import type { ValidationRule } from "@/types";
import {
  DANGLING_HYPHEN_PATTERN,
  DOCUMENT_ARTIFACT_PATTERNS,
  NON_SYMBOL_PUNCTUATION,
  PERCENTAGE_PATTERNS,
  PURE_NUMBER_PATTERNS,
} from "@/constants/validation";
import { isPairDoubled } from "@/utils/text/textNormalization";

const CONTROL_CHARACTER_PATTERN = /[\u0000-\u001f\u007f]/;
const ALPHANUMERIC_PATTERN = /[\p{L}\p{N}]/u;
const WHITESPACE_PATTERN = /\s/;
const LETTER_PATTERN = /\p{L}/u;
const LOWERCASE_LETTER_PATTERN = /\p{Ll}/u;
const EDGE_HYPHENS_PATTERN = /^[-\u2010\u2011\s]+|[-\u2010\u2011\s]+$/g;
const COMPOUND_SEPARATOR_PATTERN = /[-\u2010\u2011/]/;
const UPPERCASE_WORD_PATTERN = /^\p{Lu}+$/u;

export function tokenize(term: string): string[] {
  return term.trim().split(/\s+/).filter(Boolean);
}

function firstTokenLower(term: string): string {
  return (tokenize(term)[0] ?? "").toLowerCase();
}

function singleTokenLower(term: string): string | null {
  const tokens = tokenize(term);
  return tokens.length === 1 ? tokens[0].toLowerCase() : null;
}

/**
 * Share of symbol characters among non-whitespace characters.
 * Hyphens and apostrophes are part of words and do not count.
 */
export function symbolRatio(term: string): number {
  const chars = Array.from(term).filter((c) => !WHITESPACE_PATTERN.test(c));
  if (chars.length === 0) {
    return 0;
  }
  const symbols = chars.filter(
    (c) => !ALPHANUMERIC_PATTERN.test(c) && !NON_SYMBOL_PUNCTUATION.has(c),
  );
  return symbols.length / chars.length;
}

/**
 * Number of lower/upper switches between consecutive letters of a token
 *
 * @example
 * countCaseTransitions("Pressure")   // 1
 * countCaseTransitions("JavaScript") // 3
 * countCaseTransitions("pReSsUrE")   // 7
 */
export function countCaseTransitions(token: string): number {
  const letters = Array.from(token).filter((c) => LETTER_PATTERN.test(c));
  let transitions = 0;
  for (let i = 1; i < letters.length; i++) {
    const prevUpper = letters[i - 1] !== letters[i - 1].toLowerCase();
    const upper = letters[i] !== letters[i].toLowerCase();
    if (prevUpper !== upper) {
      transitions++;
    }
  }
  return transitions;
}

const controlCharacters: ValidationRule = {
  name: "control_characters",
  reason: "contains control characters",
  passes: (term) => !CONTROL_CHARACTER_PATTERN.test(term),
};

const lengthBounds: ValidationRule = {
  name: "length_bounds",
  reason: "term length out of bounds",
  passes: (term, { profile }) => {
    const length = term.trim().length;
    return length >= profile.minLength && length <= profile.maxLength;
  },
};

const pureNumber: ValidationRule = {
  name: "pure_number",
  reason: "pure number or percentage",
  passes: (term, { profile }) => {
    const trimmed = term.trim();
    if (
      profile.rejectPureNumbers &&
      PURE_NUMBER_PATTERNS.some((p) => p.test(trimmed))
    ) {
      return false;
    }
    if (
      profile.rejectPercentages &&
      PERCENTAGE_PATTERNS.some((p) => p.test(trimmed))
    ) {
      return false;
    }
    return true;
  },
};

const symbolRatioRule: ValidationRule = {
  name: "symbol_ratio",
  reason: "symbol-only or high symbol ratio",
  passes: (term, { profile }) =>
    ALPHANUMERIC_PATTERN.test(term) &&
    symbolRatio(term) <= profile.maxSymbolRatio,
};

const wordCount: ValidationRule = {
  name: "word_count",
  reason: "word count out of bounds",
  passes: (term, { profile }) => {
    const count = tokenize(term).length;
    return count >= profile.minWordCount && count <= profile.maxWordCount;
  },
};

const stopWord: ValidationRule = {
  name: "stop_word",
  reason: "single stop word",
  passes: (term, { lexicon }) => {
    const single = singleTokenLower(term);
    return single === null || !lexicon.stopWords.has(single);
  },
};

const leadingDeterminer: ValidationRule = {
  name: "leading_determiner",
  reason: "starts with article or determiner",
  passes: (term, { lexicon }) => {
    const first = firstTokenLower(term);
    return !(
      lexicon.articles.has(first) ||
      lexicon.demonstratives.has(first) ||
      lexicon.questionWords.has(first) ||
      lexicon.comparatives.has(first) ||
      lexicon.quantifiers.has(first)
    );
  },
};

const fragmentStarter: ValidationRule = {
  name: "fragment_starter",
  reason: "sentence fragment starter",
  passes: (term, { lexicon }) => {
    const first = firstTokenLower(term);
    return !(lexicon.conjunctions.has(first) || lexicon.prepositions.has(first));
  },
};

const standaloneMorpheme: ValidationRule = {
  name: "standalone_morpheme",
  reason: "standalone morpheme",
  passes: (term, { lexicon }) =>
    !lexicon.morphemes.has(term.replace(EDGE_HYPHENS_PATTERN, "").toLowerCase()),
};

const genericWord: ValidationRule = {
  name: "generic_word",
  reason: "overly generic single word",
  passes: (term, { lexicon }) => {
    const single = singleTokenLower(term);
    return single === null || !lexicon.genericWords.has(single);
  },
};

/**
 * Longest run of one repeated lower-case letter
 *
 * @example
 * longestLetterRun("Stirrrer")    // 3
 * longestLetterRun("Schifffahrt") // 3
 * longestLetterRun("PPP")         // 0
 */
export function longestLetterRun(token: string): number {
  let longest = 0;
  let run = 0;
  let previous = "";
  for (const c of token) {
    const isLower = LOWERCASE_LETTER_PATTERN.test(c);
    run = isLower && c === previous ? run + 1 : isLower ? 1 : 0;
    previous = c;
    longest = Math.max(longest, run);
  }
  return longest;
}

/**
 * Catches doubling the normalizer did not fold: a letter repeated more
 * often than the language allows, or a token made only of doubled pairs
 * ("Ppuummpp").
 */
const ocrDuplication: ValidationRule = {
  name: "ocr_duplication",
  reason: "OCR duplication detected",
  passes: (term, { lexicon }) =>
    tokenize(term).every((token) => {
      if (longestLetterRun(token) > lexicon.maxLetterRepeat) {
        return false;
      }
      const letters = Array.from(token).filter((c) => LETTER_PATTERN.test(c));
      return !(letters.length >= 4 && isPairDoubled(letters));
    }),
};

const documentArtifact: ValidationRule = {
  name: "document_artifact",
  reason: "document artifact / section heading",
  passes: (term) => {
    const trimmed = term.trim();
    return !DOCUMENT_ARTIFACT_PATTERNS.some((p) => p.test(trimmed));
  },
};

const brokenHyphenation: ValidationRule = {
  name: "broken_hyphenation",
  reason: "broken hyphenation remnant",
  passes: (term) => !DANGLING_HYPHEN_PATTERN.test(term.trim()),
};

/**
 * Title Case, UPPERCASE, lowercase and camel/Pascal case pass; erratic
 * switching does not. Hyphenated compounds are checked part by part.
 * All-uppercase single tokens must fit the acronym length bounds.
 */
const capitalization: ValidationRule = {
  name: "capitalization",
  reason: "invalid capitalization pattern",
  passes: (term, { profile }) => {
    const tokens = tokenize(term);
    const segments = tokens.flatMap((token) =>
      token.split(COMPOUND_SEPARATOR_PATTERN),
    );
    if (
      segments.some(
        (segment) => countCaseTransitions(segment) > profile.maxCaseTransitions,
      )
    ) {
      return false;
    }
    if (tokens.length === 1 && UPPERCASE_WORD_PATTERN.test(tokens[0])) {
      const length = tokens[0].length;
      return (
        length >= profile.minAcronymLength && length <= profile.maxAcronymLength
      );
    }
    return true;
  },
};

export const RULES: readonly ValidationRule[] = [
  controlCharacters,
  lengthBounds,
  pureNumber,
  symbolRatioRule,
  wordCount,
  stopWord,
  leadingDeterminer,
  fragmentStarter,
  standaloneMorpheme,
  genericWord,
  ocrDuplication,
  documentArtifact,
  brokenHyphenation,
  capitalization,
];

/**
 * Looks up a rule by name (diagnostics and tests)
 */
export function getRule(name: ValidationRule["name"]): ValidationRule {
  const rule = RULES.find((r) => r.name === name);
  if (!rule) {
    throw new Error(`Unknown validation rule: ${name}`);
  }
  return rule;
}

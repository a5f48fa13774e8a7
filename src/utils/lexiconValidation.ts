/**
 * Lexicon validation module
 *
 * Validates lexicon JSON structure:
 * - Known language code
 * - Every word list present, an array of non-empty strings
 * - Articles, stop words and prepositions non-empty
 * - maxLetterRepeat, when present, an integer of at least 2
 *
 * Validation is fail-fast: throws on the first problem found.
 */

import type { Language, LexiconRaw } from "@/types";
import { SUPPORTED_LANGUAGES } from "@/constants/lexicon";
import { isLanguage } from "@/utils/language";

/**
 * Error thrown when a lexicon file does not have the expected shape
 */
export class LexiconValidationError extends Error {
  constructor(message: string) {
    super(`Lexicon validation failed: ${message}`);
    this.name = "LexiconValidationError";
  }
}

type WordListField = Exclude<keyof LexiconRaw, "language" | "maxLetterRepeat">;

const REQUIRED_NON_EMPTY = new Set<WordListField>([
  "articles",
  "stopWords",
  "prepositions",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * @throws {LexiconValidationError} If value is not an array of non-empty strings
 */
function validateWordList(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new LexiconValidationError(`${fieldPath} must be an array`);
  }
  return value.map((entry: unknown, index) => {
    if (typeof entry !== "string") {
      throw new LexiconValidationError(
        `${fieldPath}[${index}] must be a string, got ${typeof entry}`,
      );
    }
    if (entry.trim().length === 0) {
      throw new LexiconValidationError(
        `${fieldPath}[${index}] cannot be empty or whitespace-only`,
      );
    }
    return entry;
  });
}

/**
 * Validates parsed lexicon JSON and returns it typed.
 *
 * @param raw - Parsed JSON (unknown shape)
 * @param expectedLanguage - Language the file was loaded for
 * @throws {LexiconValidationError} On the first structural problem
 */
export function validateLexiconRaw(
  raw: unknown,
  expectedLanguage: Language,
): LexiconRaw {
  if (!isRecord(raw)) {
    throw new LexiconValidationError("Lexicon must be an object");
  }
  const record = raw;
  const language = record.language;
  if (!isLanguage(language)) {
    throw new LexiconValidationError(
      `language must be one of ${SUPPORTED_LANGUAGES.join(", ")}`,
    );
  }
  if (language !== expectedLanguage) {
    throw new LexiconValidationError(
      `language is "${language}" but the file was loaded for "${expectedLanguage}"`,
    );
  }

  const list = (field: WordListField): string[] => {
    const words = validateWordList(record[field], field);
    if (REQUIRED_NON_EMPTY.has(field) && words.length === 0) {
      throw new LexiconValidationError(`${field} cannot be empty`);
    }
    return words;
  };

  let maxLetterRepeat: number | undefined;
  if (record.maxLetterRepeat !== undefined) {
    const repeat = record.maxLetterRepeat;
    if (typeof repeat !== "number" || !Number.isInteger(repeat) || repeat < 2) {
      throw new LexiconValidationError(
        "maxLetterRepeat must be an integer of at least 2",
      );
    }
    maxLetterRepeat = repeat;
  }

  return {
    language,
    articles: list("articles"),
    demonstratives: list("demonstratives"),
    questionWords: list("questionWords"),
    comparatives: list("comparatives"),
    quantifiers: list("quantifiers"),
    conjunctions: list("conjunctions"),
    prepositions: list("prepositions"),
    stopWords: list("stopWords"),
    morphemes: list("morphemes"),
    genericWords: list("genericWords"),
    ...(maxLetterRepeat === undefined ? {} : { maxLetterRepeat }),
  };
}

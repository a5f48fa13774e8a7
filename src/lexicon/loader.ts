/**
 * Lexicon loading and compilation
 *
 * Loads the per-language word list JSON, validates it, and compiles it
 * into read-only lower-cased sets for the preprocessor and validator.
 */

import * as fs from "fs";
import * as path from "path";
import type { Language, Lexicon, LexiconRaw } from "@/types";
import { validateLexiconRaw } from "@/utils/lexiconValidation";
import { DEFAULT_MAX_LETTER_REPEAT, LEXICON_DIR } from "@/constants/lexicon";

/**
 * Error thrown when a lexicon file cannot be read or parsed
 */
export class LexiconLoadError extends Error {
  constructor(language: Language, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Lexicon "${language}" could not be loaded: ${detail}`);
    this.name = "LexiconLoadError";
  }
}

const cache = new Map<Language, Lexicon>();

function toWordSet(words: readonly string[]): ReadonlySet<string> {
  return new Set(words.map((word) => word.trim().toLowerCase()));
}

/**
 * Compiles a validated raw lexicon into runtime form
 */
export function compileLexicon(raw: LexiconRaw): Lexicon {
  return {
    language: raw.language,
    articles: toWordSet(raw.articles),
    demonstratives: toWordSet(raw.demonstratives),
    questionWords: toWordSet(raw.questionWords),
    comparatives: toWordSet(raw.comparatives),
    quantifiers: toWordSet(raw.quantifiers),
    conjunctions: toWordSet(raw.conjunctions),
    prepositions: toWordSet(raw.prepositions),
    stopWords: toWordSet(raw.stopWords),
    morphemes: toWordSet(raw.morphemes),
    genericWords: toWordSet(raw.genericWords),
    maxLetterRepeat: raw.maxLetterRepeat ?? DEFAULT_MAX_LETTER_REPEAT,
  };
}

/**
 * Loads, validates and compiles the lexicon for a language.
 * Compiled lexicons are cached for the life of the process.
 *
 * @throws {LexiconLoadError} If the file is missing or not valid JSON
 * @throws {LexiconValidationError} If the JSON does not have the lexicon shape
 *
 * @example
 * const en = loadLexicon("en");
 * en.articles.has("the"); // true
 */
export function loadLexicon(language: Language): Lexicon {
  const cached = cache.get(language);
  if (cached) {
    return cached;
  }

  const lexiconPath = path.resolve(
    process.cwd(),
    LEXICON_DIR,
    `${language}.json`,
  );

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(lexiconPath, "utf-8"));
  } catch (err) {
    throw new LexiconLoadError(language, err);
  }

  const lexicon = compileLexicon(validateLexiconRaw(parsed, language));
  cache.set(language, lexicon);
  return lexicon;
}

/**
 * @internal Test use only
 */
export function clearLexiconCache(): void {
  cache.clear();
}

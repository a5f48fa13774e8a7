/**
 * Lexicon type definitions
 *
 * Closed per-language word lists consumed by the preprocessor and the
 * validation chain. Loaded from data/lexicons/<language>.json.
 */

export type Language = "en" | "de";

/**
 * Lexicon JSON as stored on disk (before validation)
 */
export type LexiconRaw = {
  language: Language;
  articles: string[];
  demonstratives: string[];
  questionWords: string[];
  comparatives: string[];
  quantifiers: string[];
  conjunctions: string[];
  prepositions: string[];
  stopWords: string[];
  morphemes: string[];
  genericWords: string[];
  /** Longest run of one repeated letter a real word can have ("Schifffahrt": 3) */
  maxLetterRepeat?: number;
};

/**
 * Compiled lexicon: every list lower-cased into a read-only set
 */
export type Lexicon = {
  language: Language;
  articles: ReadonlySet<string>;
  demonstratives: ReadonlySet<string>;
  questionWords: ReadonlySet<string>;
  comparatives: ReadonlySet<string>;
  quantifiers: ReadonlySet<string>;
  conjunctions: ReadonlySet<string>;
  prepositions: ReadonlySet<string>;
  stopWords: ReadonlySet<string>;
  morphemes: ReadonlySet<string>;
  genericWords: ReadonlySet<string>;
  maxLetterRepeat: number;
};

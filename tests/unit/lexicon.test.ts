/**
 * Unit tests for lexicon loading and validation
 *
 * Reads the shipped data/lexicons files; no DB, no network
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { tmpdir } from "os";
import type { LexiconRaw } from "@/types";
import {
  LexiconLoadError,
  clearLexiconCache,
  compileLexicon,
  loadLexicon,
} from "@/lexicon";
import {
  LexiconValidationError,
  validateLexiconRaw,
} from "@/utils/lexiconValidation";

function validRaw(): LexiconRaw {
  return {
    language: "en",
    articles: ["the", "a", "an"],
    demonstratives: ["this"],
    questionWords: ["which"],
    comparatives: ["more"],
    quantifiers: ["each"],
    conjunctions: ["and"],
    prepositions: ["of"],
    stopWords: ["the", "of"],
    morphemes: ["tion"],
    genericWords: ["time"],
  };
}

describe("loadLexicon", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    clearLexiconCache();
  });

  it("should load the English lexicon", () => {
    const en = loadLexicon("en");
    expect(en.language).toBe("en");
    expect(en.articles.has("the")).toBe(true);
    expect(en.prepositions.has("of")).toBe(true);
  });

  it("should load the German lexicon", () => {
    const de = loadLexicon("de");
    expect(de.language).toBe("de");
    expect(de.articles.has("die")).toBe(true);
    expect(de.articles.has("einem")).toBe(true);
  });

  it("should allow three equal letters in German only", () => {
    expect(loadLexicon("en").maxLetterRepeat).toBe(2);
    expect(loadLexicon("de").maxLetterRepeat).toBe(3);
  });

  it("should cache compiled lexicons", () => {
    expect(loadLexicon("en")).toBe(loadLexicon("en"));
  });

  it("should throw LexiconLoadError when the file is missing", () => {
    vi.spyOn(process, "cwd").mockReturnValue(tmpdir());
    expect(() => loadLexicon("de")).toThrow(LexiconLoadError);
  });
});

describe("compileLexicon", () => {
  it("should lower-case and trim words", () => {
    const lexicon = compileLexicon({ ...validRaw(), articles: [" The ", "AN"] });
    expect(lexicon.articles.has("the")).toBe(true);
    expect(lexicon.articles.has("an")).toBe(true);
    expect(lexicon.articles.size).toBe(2);
  });

  it("should default the letter repeat limit to two", () => {
    expect(compileLexicon(validRaw()).maxLetterRepeat).toBe(2);
    expect(compileLexicon({ ...validRaw(), maxLetterRepeat: 3 }).maxLetterRepeat).toBe(3);
  });
});

describe("validateLexiconRaw", () => {
  it("should return a valid lexicon unchanged", () => {
    expect(validateLexiconRaw(validRaw(), "en")).toEqual(validRaw());
  });

  it("should reject non-objects", () => {
    expect(() => validateLexiconRaw([], "en")).toThrow(
      "Lexicon validation failed: Lexicon must be an object",
    );
    expect(() => validateLexiconRaw(null, "en")).toThrow(LexiconValidationError);
  });

  it("should reject unknown languages", () => {
    expect(() =>
      validateLexiconRaw({ ...validRaw(), language: "fr" }, "en"),
    ).toThrow("Lexicon validation failed: language must be one of en, de");
  });

  it("should reject a file loaded for another language", () => {
    expect(() => validateLexiconRaw(validRaw(), "de")).toThrow(
      'Lexicon validation failed: language is "en" but the file was loaded for "de"',
    );
  });

  it("should reject a missing word list", () => {
    const { genericWords: _omitted, ...rest } = validRaw();
    expect(() => validateLexiconRaw(rest, "en")).toThrow(
      "Lexicon validation failed: genericWords must be an array",
    );
  });

  it("should reject non-string entries", () => {
    expect(() =>
      validateLexiconRaw({ ...validRaw(), stopWords: ["the", 3] }, "en"),
    ).toThrow(
      "Lexicon validation failed: stopWords[1] must be a string, got number",
    );
  });

  it("should reject blank entries", () => {
    expect(() =>
      validateLexiconRaw({ ...validRaw(), morphemes: ["  "] }, "en"),
    ).toThrow(
      "Lexicon validation failed: morphemes[0] cannot be empty or whitespace-only",
    );
  });

  it("should require articles, stop words and prepositions", () => {
    expect(() =>
      validateLexiconRaw({ ...validRaw(), articles: [] }, "en"),
    ).toThrow("Lexicon validation failed: articles cannot be empty");
  });

  it("should validate the letter repeat limit", () => {
    expect(
      validateLexiconRaw({ ...validRaw(), maxLetterRepeat: 3 }, "en").maxLetterRepeat,
    ).toBe(3);
    for (const maxLetterRepeat of [1, 2.5, "3"]) {
      expect(() =>
        validateLexiconRaw({ ...validRaw(), maxLetterRepeat }, "en"),
      ).toThrow(
        "Lexicon validation failed: maxLetterRepeat must be an integer of at least 2",
      );
    }
  });

  it("should allow other lists to be empty", () => {
    expect(
      validateLexiconRaw({ ...validRaw(), genericWords: [] }, "en").genericWords,
    ).toEqual([]);
  });
});

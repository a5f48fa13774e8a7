/**
 * Unit tests for term preprocessing and term keys
 *
 * Uses the shipped EN/DE lexicons, no DB, no network
 */

import { describe, it, expect } from "vitest";
import { loadLexicon } from "@/lexicon";
import {
  preprocessTerm,
  stripLeadingArticle,
} from "@/utils/text/termPreprocessing";
import { toTermKey } from "@/utils/text/termKey";

const en = loadLexicon("en");
const de = loadLexicon("de");

describe("preprocessTerm", () => {
  it("should strip a leading article and collapse whitespace", () => {
    expect(preprocessTerm("The  Pressure Transmitter", en)).toBe(
      "Pressure Transmitter",
    );
    expect(preprocessTerm("an Actuator", en)).toBe("Actuator");
  });

  it("should strip German articles", () => {
    expect(preprocessTerm("die Pumpe", de)).toBe("Pumpe");
    expect(preprocessTerm("Der Druckmessumformer", de)).toBe(
      "Druckmessumformer",
    );
  });

  it("should strip any article of the language before a term", () => {
    for (const lexicon of [en, de]) {
      for (const article of lexicon.articles) {
        expect(preprocessTerm(`${article} Heat Exchanger`, lexicon)).toBe(
          "Heat Exchanger",
        );
      }
    }
  });

  it("should keep a lone article and mid-phrase articles", () => {
    expect(preprocessTerm("the", en)).toBe("the");
    expect(preprocessTerm("Point of the Valve", en)).toBe(
      "Point of the Valve",
    );
  });

  it("should strip only one leading article", () => {
    expect(preprocessTerm("The A Frame", en)).toBe("A Frame");
  });

  it("should strip hyphens and dashes left at the edges", () => {
    expect(preprocessTerm("Mem-", en)).toBe("Mem");
    expect(preprocessTerm("-able", en)).toBe("able");
    expect(preprocessTerm("—Pump—", en)).toBe("Pump");
    expect(preprocessTerm("An – Valve", en)).toBe("Valve");
  });

  it("should keep inner hyphens", () => {
    expect(preprocessTerm("fail-safe", en)).toBe("fail-safe");
  });

  it("should return empty string for non-string input", () => {
    expect(preprocessTerm(undefined, en)).toBe("");
    expect(preprocessTerm(12, en)).toBe("");
    expect(preprocessTerm("  -- ", en)).toBe("");
  });
});

describe("stripLeadingArticle", () => {
  it("should compare the article case-insensitively", () => {
    expect(stripLeadingArticle("THE Valve", en.articles)).toBe("Valve");
  });

  it("should not strip a word that only starts like an article", () => {
    expect(stripLeadingArticle("Theory Part", en.articles)).toBe("Theory Part");
  });
});

describe("toTermKey", () => {
  it("should lower-case and collapse whitespace", () => {
    expect(toTermKey("  Pressure   Transmitter ")).toBe("pressure transmitter");
  });

  it("should give composed and decomposed forms the same key", () => {
    expect(toTermKey("U\u0308berdruck")).toBe("\u00fcberdruck");
    expect(toTermKey("\u00DCberdruck")).toBe("\u00fcberdruck");
  });
});

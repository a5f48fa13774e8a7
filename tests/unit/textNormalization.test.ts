/**
 * Unit tests for page text normalization
 *
 * Pure string repair: doubling, cid placeholders, hyphenation, spacing
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  collapseWhitespace,
  foldDoubledLetters,
  isPairDoubled,
  joinSpacedLetters,
  normalizeText,
  stripCidPlaceholders,
} from "@/utils/text/textNormalization";

describe("isPairDoubled", () => {
  it("should accept words made only of equal letter pairs", () => {
    expect(isPairDoubled(Array.from("Tthhee"))).toBe(true);
    expect(isPairDoubled(Array.from("rrrr"))).toBe(true);
  });

  it("should reject odd lengths and mismatched pairs", () => {
    expect(isPairDoubled(Array.from("The"))).toBe(false);
    expect(isPairDoubled(Array.from("book"))).toBe(false);
    expect(isPairDoubled([])).toBe(false);
  });
});

describe("foldDoubledLetters", () => {
  it("should fold systemic doubling", () => {
    expect(foldDoubledLetters("Tthhee Ssttiirrrreerr")).toBe("The Stirrer");
  });

  it("should keep genuine double letters", () => {
    expect(foldDoubledLetters("bookkeeper")).toBe("bookkeeper");
    expect(foldDoubledLetters("The pressure is too high")).toBe(
      "The pressure is too high",
    );
  });

  it("should leave an isolated doubled word below the pair threshold", () => {
    expect(foldDoubledLetters("see ee here")).toBe("see ee here");
  });

  it("should only fold the doubled run inside normal text", () => {
    expect(foldDoubledLetters("Clean the Ssttiirrrreerr daily")).toBe(
      "Clean the Stirrer daily",
    );
  });
});

describe("stripCidPlaceholders", () => {
  it("should replace placeholders with a space", () => {
    expect(stripCidPlaceholders("Pump(cid:72)Valve")).toBe("Pump Valve");
    expect(stripCidPlaceholders("a cid:3 b")).toBe("a   b");
  });
});

describe("collapseWhitespace", () => {
  it("should collapse runs and trim", () => {
    expect(collapseWhitespace("  a\t\tb \n c  ")).toBe("a b c");
  });

  it("should join words hyphenated across a line break", () => {
    expect(collapseWhitespace("nitro-\ngen supply")).toBe("nitrogen supply");
    expect(collapseWhitespace("Druck-\r\n  messung")).toBe("Druckmessung");
  });

  it("should keep hyphens that are not at a line break", () => {
    expect(collapseWhitespace("fail-safe valve")).toBe("fail-safe valve");
  });

  it("should keep a line-break hyphen before a capitalized word", () => {
    expect(collapseWhitespace("Ex-\nSchutz")).toBe("Ex- Schutz");
  });
});

describe("joinSpacedLetters", () => {
  it("should join four or more spaced letters", () => {
    expect(joinSpacedLetters("T e m p e r a t u r e sensor")).toBe(
      "Temperature sensor",
    );
  });

  it("should leave short letter runs alone", () => {
    expect(joinSpacedLetters("a b c")).toBe("a b c");
  });

  it("should leave enumerations of capitals alone", () => {
    expect(joinSpacedLetters("Valves A B C D are shown")).toBe(
      "Valves A B C D are shown",
    );
    expect(normalizeText("Valves A B C D are shown in the figure.")).toBe(
      "Valves A B C D are shown in the figure.",
    );
  });

  it("should stop a run at the first capital after the first letter", () => {
    expect(joinSpacedLetters("d r u c k M")).toBe("druck M");
  });
});

describe("normalizeText", () => {
  it("should apply every repair in order", () => {
    expect(
      normalizeText("Tthhee Ssttiirrrreerr (cid:3) mixes nitro-\ngen"),
    ).toBe("The Stirrer mixes nitrogen");
  });

  it("should return empty string for non-string input", () => {
    expect(normalizeText(undefined)).toBe("");
    expect(normalizeText(null)).toBe("");
    expect(normalizeText(42)).toBe("");
  });

  it("should leave clean text unchanged", () => {
    const clean = "The bookkeeper's office stores the Pressure Transmitter.";
    expect(normalizeText(clean)).toBe(clean);
  });

  it("should undo artificial letter doubling", () => {
    const doubleLetters = (text: string): string =>
      text.replace(/\p{L}/gu, (c) => c + c.toLowerCase());
    const sentences = [
      "The bookkeeper checks the pressure valve.",
      "Pump 12 delivers 40 bar at 3 a.m. daily.",
      "Der Öl-Abscheider trennt Wasser.",
      "Mixing 3 samples, the PLC starts the Stirrer.",
    ];
    for (const sentence of sentences) {
      expect(normalizeText(doubleLetters(sentence))).toBe(
        normalizeText(sentence),
      );
    }
  });

  it("should be idempotent", () => {
    const inputs = [
      "Tthhee Ssttiirrrreerr (cid:3) mixes nitro-\ngen",
      "T e m p e r a t u r e  sensor\n\nreading",
      "  fail-safe   valve ",
    ];
    for (const input of inputs) {
      const once = normalizeText(input);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

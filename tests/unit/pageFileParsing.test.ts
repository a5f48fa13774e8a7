/**
 * Unit tests for page file parsing
 */

import { describe, it, expect } from "vitest";
import { PageFileError, parsePages } from "@/utils/pageFileParsing";

describe("parsePages", () => {
  it("should accept text pages and failed pages", () => {
    expect(
      parsePages([
        { pageNumber: 1, text: "The PLC starts." },
        { pageNumber: 2, error: "encrypted page" },
        { pageNumber: 3 },
      ]),
    ).toEqual([
      { pageNumber: 1, text: "The PLC starts." },
      { pageNumber: 2, error: "encrypted page" },
      { pageNumber: 3, text: "" },
    ]);
  });

  it("should reject malformed files", () => {
    expect(() => parsePages({ pages: [] })).toThrow(
      "Invalid page file: expected an array of pages",
    );
    expect(() => parsePages(["text"])).toThrow(
      "Invalid page file: pages[0] must be an object",
    );
    expect(() => parsePages([{ pageNumber: 0, text: "" }])).toThrow(
      PageFileError,
    );
  });

  it("should name the entry with a bad page number", () => {
    expect(() =>
      parsePages([{ pageNumber: 1, text: "ok" }, { pageNumber: 1.5, text: "" }]),
    ).toThrow("Invalid page file: pages[1].pageNumber must be a positive integer");
  });

  it("should keep a non-string text as an empty page", () => {
    expect(parsePages([{ pageNumber: 4, text: 12 }])).toEqual([
      { pageNumber: 4, text: "" },
    ]);
  });
});

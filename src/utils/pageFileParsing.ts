/**
 * Page file parsing
 *
 * Page files hold the output of the document text extraction layer:
 * [{ "pageNumber": 1, "text": "..." }, { "pageNumber": 2, "error": "..." }]
 */

import type { DocumentPage } from "@/types";

export class PageFileError extends Error {
  constructor(message: string) {
    super(`Invalid page file: ${message}`);
    this.name = "PageFileError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates parsed page file JSON.
 *
 * An entry with an "error" string is an upstream failure for that page.
 * A text entry whose text is not a string is kept as an empty page.
 *
 * @throws {PageFileError} If the structure is not a page list
 */
export function parsePages(raw: unknown): DocumentPage[] {
  if (!Array.isArray(raw)) {
    throw new PageFileError("expected an array of pages");
  }

  return raw.map((entry: unknown, index): DocumentPage => {
    if (!isRecord(entry)) {
      throw new PageFileError(`pages[${index}] must be an object`);
    }
    const { pageNumber } = entry;
    if (typeof pageNumber !== "number" || !Number.isInteger(pageNumber) || pageNumber < 1) {
      throw new PageFileError(`pages[${index}].pageNumber must be a positive integer`);
    }
    if (typeof entry.error === "string") {
      return { pageNumber, error: entry.error };
    }
    return {
      pageNumber,
      text: typeof entry.text === "string" ? entry.text : "",
    };
  });
}

/**
 * Unit tests for SQLite error classification
 */

import { describe, it, expect } from "vitest";
import { isUniqueConstraintError, UNIQUE_CONSTRAINT_PREFIX } from "@/utils/dbErrors";

describe("isUniqueConstraintError", () => {
  const termKeyConflict = new Error(
    "UNIQUE constraint failed: glossary_terms.term_key, glossary_terms.language",
  );

  it("should match any UNIQUE violation without a table", () => {
    expect(isUniqueConstraintError(termKeyConflict)).toBe(true);
    expect(
      isUniqueConstraintError(new Error(`${UNIQUE_CONSTRAINT_PREFIX} extraction_runs.id`)),
    ).toBe(true);
  });

  it("should match only violations on the given table", () => {
    expect(isUniqueConstraintError(termKeyConflict, "glossary_terms")).toBe(true);
    expect(isUniqueConstraintError(termKeyConflict, "glossary")).toBe(false);
    expect(isUniqueConstraintError(termKeyConflict, "extraction_runs")).toBe(false);
  });

  it("should reject other errors and non-errors", () => {
    expect(isUniqueConstraintError(new Error("FOREIGN KEY constraint failed"))).toBe(false);
    expect(isUniqueConstraintError(termKeyConflict.message)).toBe(false);
    expect(isUniqueConstraintError(undefined)).toBe(false);
  });
});

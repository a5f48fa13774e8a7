/**
 * Glossary aggregation errors
 */

import type { Language } from "@/types";

/**
 * A term save kept conflicting with a concurrent writer after retrying
 */
export class AggregationConflictError extends Error {
  constructor(termKey: string, language: Language, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `Aggregation conflict for "${termKey}" (${language}) after retry: ${detail}`,
    );
    this.name = "AggregationConflictError";
  }
}

export class GlossaryTermNotFoundError extends Error {
  constructor(termKey: string, language: Language) {
    super(`Glossary term not found: "${termKey}" (${language})`);
    this.name = "GlossaryTermNotFoundError";
  }
}

export class DefinitionNotFoundError extends Error {
  constructor(termKey: string, index: number) {
    super(`Term "${termKey}" has no definition at index ${index}`);
    this.name = "DefinitionNotFoundError";
  }
}

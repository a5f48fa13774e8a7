/**
 * Glossary Store Interface
 *
 * Persistence contract consumed by the aggregator: lookup and save of
 * whole term aggregates by (termKey, language).
 */

import type { GlossaryTerm, Language } from "@/types";

export interface GlossaryStore {
  /**
   * Find a term by its case-insensitive key
   *
   * @returns The stored aggregate, or undefined when absent
   */
  findTerm(termKey: string, language: Language): Promise<GlossaryTerm | undefined>;

  /**
   * Persist a term aggregate (insert when `id` is null, replace otherwise)
   *
   * Inserting a (termKey, language) pair that already exists must fail
   * with a UNIQUE constraint error so the aggregator can re-read and retry.
   *
   * @returns The stored aggregate with its id
   */
  saveTerm(term: GlossaryTerm): Promise<GlossaryTerm>;
}

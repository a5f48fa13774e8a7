/**
 * In-memory glossary store
 *
 * Used for dry runs and tests. Returns copies so callers never hold
 * references into the stored state. Mirrors the SQLite store's UNIQUE
 * behavior on insert.
 */

import type { GlossaryTerm, Language } from "@/types";
import type { GlossaryStore } from "@/interfaces/glossary/glossaryStore";
import { UNIQUE_CONSTRAINT_PREFIX } from "@/utils/dbErrors";

function storeKey(termKey: string, language: Language): string {
  return `${language}\u0000${termKey}`;
}

export class InMemoryGlossaryStore implements GlossaryStore {
  private readonly terms = new Map<string, GlossaryTerm>();
  private nextId = 1;

  async findTerm(
    termKey: string,
    language: Language,
  ): Promise<GlossaryTerm | undefined> {
    const term = this.terms.get(storeKey(termKey, language));
    return term ? structuredClone(term) : undefined;
  }

  async saveTerm(term: GlossaryTerm): Promise<GlossaryTerm> {
    const key = storeKey(term.termKey, term.language);
    const stored = this.terms.get(key);

    if (term.id === null && stored) {
      throw new Error(
        `${UNIQUE_CONSTRAINT_PREFIX} glossary_terms.term_key, glossary_terms.language`,
      );
    }

    const saved: GlossaryTerm = {
      ...structuredClone(term),
      id: term.id ?? this.nextId++,
    };
    this.terms.set(key, saved);
    return structuredClone(saved);
  }

  /**
   * All stored terms in insertion order
   */
  list(): GlossaryTerm[] {
    return Array.from(this.terms.values(), (term) => structuredClone(term));
  }

  get size(): number {
    return this.terms.size;
  }
}

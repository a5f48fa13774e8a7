/**
 * SQLite-backed glossary store
 *
 * Adapts the synchronous glossary repository to the GlossaryStore
 * contract. Requires an open database (openDb() or the test harness).
 */

import type { GlossaryTerm, Language } from "@/types";
import type { GlossaryStore } from "@/interfaces/glossary/glossaryStore";
import {
  getGlossaryTermById,
  getGlossaryTermByKey,
  insertGlossaryTerm,
  replaceGlossaryTerm,
} from "@/db/repos/glossaryRepo";

export class SqliteGlossaryStore implements GlossaryStore {
  async findTerm(
    termKey: string,
    language: Language,
  ): Promise<GlossaryTerm | undefined> {
    return getGlossaryTermByKey(termKey, language);
  }

  async saveTerm(term: GlossaryTerm): Promise<GlossaryTerm> {
    let id: number;
    if (term.id === null) {
      id = insertGlossaryTerm(term);
    } else {
      id = term.id;
      replaceGlossaryTerm(id, term);
    }

    const saved = getGlossaryTermById(id);
    if (!saved) {
      throw new Error(`Glossary term ${id} missing after save`);
    }
    return saved;
  }
}

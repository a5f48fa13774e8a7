/**
 * Cross-document aggregation: merge accepted terms into the glossary store
 *
 * Writes for one (termKey, language) are serialized through a keyed mutex;
 * different terms are written concurrently. A save that hits a UNIQUE
 * conflict (another writer inserted the term first) is re-read, re-merged
 * and retried once before surfacing as AggregationConflictError.
 */

import type {
  AcceptedCandidate,
  GlossaryTerm,
  IngestOptions,
  IngestSummary,
  Language,
  MergeResult,
  TermIngestInput,
} from "@/types";
import type { GlossaryStore } from "@/interfaces/glossary/glossaryStore";
import {
  DEFAULT_INGEST_CONCURRENCY,
  MAX_SAVE_ATTEMPTS,
} from "@/constants/glossary";
import * as logger from "@/logger";
import { isUniqueConstraintError } from "@/utils/dbErrors";
import { KeyedMutex, mapWithConcurrency } from "@/utils/concurrency";
import { toTermKey } from "@/utils/text/termKey";
import { mergeGlossaryTerm, withPrimaryDefinition } from "./mergeGlossaryTerm";
import { AggregationConflictError, GlossaryTermNotFoundError } from "./errors";

/**
 * Process-wide lock so concurrent documents also serialize per term
 */
const sharedMutex = new KeyedMutex();

function lockKey(termKey: string, language: Language): string {
  return `${language}\u0000${termKey}`;
}

/**
 * Merge one term occurrence set into the store
 *
 * @throws {AggregationConflictError} If the save still conflicts after retry
 */
export async function ingestTerm(
  store: GlossaryStore,
  input: TermIngestInput,
  mutex: KeyedMutex = sharedMutex,
): Promise<MergeResult> {
  const termKey = toTermKey(input.term);

  return mutex.runExclusive(lockKey(termKey, input.language), async () => {
    for (let attempt = 1; ; attempt++) {
      const existing = await store.findTerm(termKey, input.language);
      const result = mergeGlossaryTerm(existing, input);
      if (result.outcome === "unchanged") {
        return result;
      }

      try {
        const saved = await store.saveTerm(result.term);
        return { ...result, term: saved };
      } catch (err) {
        if (!isUniqueConstraintError(err, "glossary_terms")) {
          throw err;
        }
        if (attempt >= MAX_SAVE_ATTEMPTS) {
          throw new AggregationConflictError(termKey, input.language, err);
        }
        logger.warn("Term save conflicted, retrying", {
          termKey,
          language: input.language,
          attempt,
        });
      }
    }
  });
}

/**
 * Merge a document's accepted candidates into the store
 *
 * Conflicts that survive the retry are counted in `failed` and logged;
 * any other store error aborts the batch.
 *
 * @example
 * const summary = await ingestAcceptedCandidates(store, result.accepted, {
 *   documentId: "manual-7",
 *   language: "en",
 * });
 * // { created: 12, updated: 3, unchanged: 0, rejectedDuplicates: 1, failed: 0 }
 */
export async function ingestAcceptedCandidates(
  store: GlossaryStore,
  accepted: readonly AcceptedCandidate[],
  options: IngestOptions & { mutex?: KeyedMutex },
): Promise<IngestSummary> {
  const summary: IngestSummary = {
    created: 0,
    updated: 0,
    unchanged: 0,
    rejectedDuplicates: 0,
    failed: 0,
  };

  // A term listed twice in one batch only contributes one definition
  const seenKeys = new Set<string>();
  const inputs: TermIngestInput[] = accepted.map((candidate) => {
    const key = toTermKey(candidate.term);
    const isFirstDefinitionForDocument = !seenKeys.has(key);
    seenKeys.add(key);
    return {
      term: candidate.term,
      language: options.language,
      definition: {
        text: candidate.definition.text,
        isContextSnippet: candidate.definition.kind === "context_snippet",
      },
      documentId: options.documentId,
      frequency: candidate.frequency,
      pageNumbers: candidate.pageNumbers,
      contextExcerpt: candidate.contextExcerpt,
      domainTags: options.domainTags,
      isFirstDefinitionForDocument,
    };
  });

  await mapWithConcurrency(
    inputs,
    options.concurrency ?? DEFAULT_INGEST_CONCURRENCY,
    async (input) => {
      let result: MergeResult;
      try {
        result = await ingestTerm(store, input, options.mutex);
      } catch (err) {
        if (!(err instanceof AggregationConflictError)) {
          throw err;
        }
        summary.failed++;
        logger.error("Failed to ingest term", {
          term: input.term,
          documentId: input.documentId,
          error: err.message,
        });
        return;
      }

      switch (result.outcome) {
        case "created":
          summary.created++;
          break;
        case "reference_added":
        case "reference_updated":
          summary.updated++;
          break;
        case "unchanged":
          summary.unchanged++;
          break;
      }
      if (result.duplicateDefinition) {
        summary.rejectedDuplicates++;
      }
    },
  );

  return summary;
}

/**
 * Make the definition at `index` the term's primary definition
 *
 * @throws {GlossaryTermNotFoundError} If the term does not exist
 * @throws {DefinitionNotFoundError} If there is no definition at `index`
 */
export async function setPrimaryDefinition(
  store: GlossaryStore,
  term: string,
  language: Language,
  index: number,
  mutex: KeyedMutex = sharedMutex,
): Promise<GlossaryTerm> {
  const termKey = toTermKey(term);
  return mutex.runExclusive(lockKey(termKey, language), async () => {
    const existing = await store.findTerm(termKey, language);
    if (!existing) {
      throw new GlossaryTermNotFoundError(termKey, language);
    }
    return store.saveTerm(withPrimaryDefinition(existing, index));
  });
}

/**
 * Term extraction pipeline for one document
 *
 * pages → normalize → generate candidates (parallel per page)
 *       → preprocess → group by term key → validate → synthesize definition
 *
 * Failed pages are skipped and reported. When the document deadline passes,
 * pages not yet started are dropped and the result is marked timedOut;
 * everything gathered so far is still returned.
 */

import type {
  AcceptedCandidate,
  Candidate,
  DocumentPage,
  ExtractOptions,
  ExtractionResult,
  FailedPage,
  PageExtractionFailure,
  RawPage,
  RejectedCandidate,
} from "@/types";
import {
  BELOW_MIN_FREQUENCY_REASON,
  DEFAULT_DOCUMENT_TIMEOUT_MS,
  DEFAULT_MIN_FREQUENCY,
  DEFAULT_PAGE_CONCURRENCY,
  EMPTY_AFTER_PREPROCESSING_REASON,
  MAX_DEFINITION_SENTENCES,
} from "@/constants/extraction";
import * as logger from "@/logger";
import { loadLexicon } from "@/lexicon";
import { createTermValidator } from "@/validation";
import { normalizeText } from "@/utils/text/textNormalization";
import { preprocessTerm } from "@/utils/text/termPreprocessing";
import { toTermKey } from "@/utils/text/termKey";
import { mapWithConcurrency } from "@/utils/concurrency";
import { generateCandidates } from "./candidates/generateCandidates";
import { describeStrategies } from "./candidates/linguisticStrategy";
import { synthesizeDefinition } from "./definitions/synthesizeDefinition";

/**
 * All occurrences of one term key across the document
 */
type TermGroup = {
  /** Surface form -> occurrences */
  forms: Map<string, number>;
  frequency: number;
  pages: Set<number>;
  sentences: string[];
  context: string;
};

export function isPageExtractionFailure(
  page: DocumentPage,
): page is PageExtractionFailure {
  return "error" in page;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Most frequent surface form; ties go to the form seen first
 */
function pickRepresentative(forms: Map<string, number>): string {
  let best = "";
  let bestCount = 0;
  for (const [form, count] of forms) {
    if (count > bestCount) {
      best = form;
      bestCount = count;
    }
  }
  return best;
}

function sortedPages(pages: Iterable<number>): number[] {
  return Array.from(pages).sort((a, b) => a - b);
}

function addToGroup(
  groups: Map<string, TermGroup>,
  term: string,
  candidate: Candidate,
): void {
  const key = toTermKey(term);
  let group = groups.get(key);
  if (!group) {
    group = {
      forms: new Map(),
      frequency: 0,
      pages: new Set(),
      sentences: [],
      context: candidate.context,
    };
    groups.set(key, group);
  }
  group.forms.set(term, (group.forms.get(term) ?? 0) + candidate.frequency);
  group.frequency += candidate.frequency;
  for (const page of candidate.pageNumbers) {
    group.pages.add(page);
  }
  if (
    group.sentences.length < MAX_DEFINITION_SENTENCES &&
    !group.sentences.includes(candidate.sentence)
  ) {
    group.sentences.push(candidate.sentence);
  }
}

/**
 * Runs the extraction pipeline over a document's pages.
 *
 * @example
 * const result = await extractTerms(
 *   [{ pageNumber: 1, text: "The Pressure Transmitter is a device that measures pressure." }],
 *   { language: "en" },
 * );
 * result.accepted[0].definition.text;
 * // "Pressure Transmitter is a device that measures pressure."
 */
export async function extractTerms(
  pages: readonly DocumentPage[],
  options: ExtractOptions,
): Promise<ExtractionResult> {
  const lexicon = options.lexicon ?? loadLexicon(options.language);
  const validator = createTermValidator({ lexicon, profile: options.profile });
  const analyzer = options.analyzer ?? null;
  const now = options.now ?? Date.now;
  const deadline = now() + (options.timeoutMs ?? DEFAULT_DOCUMENT_TIMEOUT_MS);
  const minFrequency = options.minFrequency ?? DEFAULT_MIN_FREQUENCY;

  const failedPages: FailedPage[] = [];
  const rawPages: RawPage[] = [];
  for (const page of pages) {
    if (isPageExtractionFailure(page)) {
      logger.warn("Skipping page: upstream text extraction failed", {
        pageNumber: page.pageNumber,
        error: page.error,
      });
      failedPages.push({ pageNumber: page.pageNumber, error: page.error });
    } else {
      rawPages.push(page);
    }
  }

  let timedOut = false;
  let pagesProcessed = 0;
  const perPage = await mapWithConcurrency(
    rawPages,
    options.concurrency ?? DEFAULT_PAGE_CONCURRENCY,
    async (page): Promise<Candidate[]> => {
      if (now() >= deadline) {
        timedOut = true;
        return [];
      }
      await yieldToEventLoop();
      const text = normalizeText(page.text);
      const candidates = Array.from(
        generateCandidates({ pageNumber: page.pageNumber, text }, { analyzer }),
      );
      pagesProcessed++;
      return candidates;
    },
  );

  if (timedOut) {
    logger.warn("Document deadline reached, returning partial results", {
      pagesProcessed,
      pagesTotal: rawPages.length,
    });
  }

  const groups = new Map<string, TermGroup>();
  const discarded = new Map<string, RejectedCandidate>();
  let candidatesTotal = 0;

  for (const candidate of perPage.flat()) {
    candidatesTotal++;
    const term = preprocessTerm(candidate.rawText, lexicon);
    if (term.length > 0) {
      addToGroup(groups, term, candidate);
      continue;
    }
    const existing = discarded.get(candidate.rawText);
    if (existing) {
      existing.frequency += candidate.frequency;
      existing.pageNumbers = sortedPages(
        new Set([...existing.pageNumbers, ...candidate.pageNumbers]),
      );
    } else {
      discarded.set(candidate.rawText, {
        text: candidate.rawText,
        reason: EMPTY_AFTER_PREPROCESSING_REASON,
        rule: null,
        frequency: candidate.frequency,
        pageNumbers: [...candidate.pageNumbers],
      });
    }
  }

  const accepted: AcceptedCandidate[] = [];
  const rejected: RejectedCandidate[] = Array.from(discarded.values());

  for (const [termKey, group] of groups) {
    const term = pickRepresentative(group.forms);
    const pageNumbers = sortedPages(group.pages);
    const verdict = validator.validate(term);

    if (!verdict.accepted) {
      rejected.push({
        text: term,
        reason: verdict.reason,
        rule: verdict.rule,
        frequency: group.frequency,
        pageNumbers,
      });
      continue;
    }
    if (group.frequency < minFrequency) {
      rejected.push({
        text: term,
        reason: BELOW_MIN_FREQUENCY_REASON,
        rule: null,
        frequency: group.frequency,
        pageNumbers,
      });
      continue;
    }

    const [sentence = "", ...additionalSentences] = group.sentences;
    accepted.push({
      term,
      termKey,
      frequency: group.frequency,
      pageNumbers,
      sentence,
      contextExcerpt: group.context,
      definition: synthesizeDefinition({
        term,
        sentence,
        additionalSentences,
        context: group.context,
        pageNumbers,
      }),
    });
  }

  accepted.sort(
    (a, b) =>
      b.frequency - a.frequency ||
      (a.term < b.term ? -1 : a.term > b.term ? 1 : 0),
  );

  const rejectionCounts: Record<string, number> = {};
  for (const entry of rejected) {
    rejectionCounts[entry.reason] = (rejectionCounts[entry.reason] ?? 0) + 1;
  }

  logger.debug("Extraction finished", {
    candidatesTotal,
    accepted: accepted.length,
    rejected: rejected.length,
    rejectionCounts,
  });

  return {
    accepted,
    rejected,
    rejectionCounts,
    candidatesTotal,
    pagesProcessed,
    failedPages,
    timedOut,
    strategies: describeStrategies(analyzer),
  };
}

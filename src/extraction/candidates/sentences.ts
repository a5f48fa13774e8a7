/**
 * Sentence splitting and occurrence context
 */

import {
  CONTEXT_WINDOW_CHARS,
  MAX_SENTENCE_LENGTH,
  SENTENCE_BOUNDARY_PATTERN,
} from "@/constants/candidates";

export type SentenceSpan = {
  text: string;
  /** Offset of the sentence in the page text */
  start: number;
};

/**
 * Splits normalized text at ".", "!" or "?" followed by whitespace and an
 * upper-case letter or digit. The last sentence runs to the end of text.
 */
export function splitSentences(text: string): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  let cursor = 0;
  for (const part of text.split(SENTENCE_BOUNDARY_PATTERN)) {
    const start = text.indexOf(part, cursor);
    const trimmed = part.trim();
    if (trimmed.length > 0) {
      spans.push({ text: trimmed, start: start + part.indexOf(trimmed) });
    }
    cursor = start + part.length;
  }
  return spans;
}

/**
 * Excerpt of `text` around [index, index + length), at most
 * CONTEXT_WINDOW_CHARS on each side, with "..." where it was cut
 *
 * @example
 * buildContext("a long page ...", 120, 8)
 */
export function buildContext(
  text: string,
  index: number,
  length: number,
  window: number = CONTEXT_WINDOW_CHARS,
): string {
  const start = Math.max(0, index - window);
  const end = Math.min(text.length, index + length + window);
  const prefix = start > 0 ? "..." : "";
  const suffix = end < text.length ? "..." : "";
  return `${prefix}${text.slice(start, end).trim()}${suffix}`;
}

/**
 * Sentence as stored on a candidate: overly long sentences are cut to a
 * window around the occurrence
 */
export function boundSentence(
  sentence: string,
  index: number,
  length: number,
): string {
  if (sentence.length <= MAX_SENTENCE_LENGTH) {
    return sentence;
  }
  const window = Math.max(0, Math.floor((MAX_SENTENCE_LENGTH - length) / 2));
  return buildContext(sentence, index, length, window);
}

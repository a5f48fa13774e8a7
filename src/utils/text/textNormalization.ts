/**
 * Page text normalization
 *
 * Repairs OCR and PDF encoding damage in raw page text before candidate
 * generation. The cleanup never changes legitimate words: genuine double
 * letters ("pressure", "bookkeeper") survive, only systemic doubling folds.
 *
 * Steps (applied in order):
 * 1. Fold systemic letter doubling ("Tthhee Ssttiirrrreerr" → "The Stirrer")
 * 2. Replace cid:<digits> placeholders with a space
 * 3. Join words hyphenated across a line break, collapse whitespace
 * 4. Join spaced-out letters ("T e m p e r a t u r e" → "Temperature")
 */

import {
  CID_PLACEHOLDER_PATTERN,
  LINE_BREAK_HYPHENATION_PATTERN,
  MIN_DOUBLED_PAIRS,
  SPACED_LETTERS_PATTERN,
} from "@/constants/textNormalization";

const LETTER_RUN_PATTERN = /\p{L}+/gu;
const WHITESPACE_RUN_PATTERN = /\s+/g;

type LetterRun = {
  start: number;
  end: number;
  chars: string[];
};

/**
 * True when the word is made only of letter pairs whose two characters
 * are equal ignoring case ("Tthhee", "rrrr"). Requires at least one pair.
 */
export function isPairDoubled(chars: readonly string[]): boolean {
  if (chars.length < 2 || chars.length % 2 !== 0) {
    return false;
  }
  for (let i = 0; i < chars.length; i += 2) {
    if (chars[i].toLowerCase() !== chars[i + 1].toLowerCase()) {
      return false;
    }
  }
  return true;
}

function foldPairs(chars: readonly string[]): string {
  let folded = "";
  for (let i = 0; i < chars.length; i += 2) {
    folded += chars[i];
  }
  return folded;
}

/**
 * Folds runs of consecutive pair-doubled words.
 *
 * A run is a maximal sequence of pair-doubled words separated only by
 * non-letters. It folds when its words hold at least MIN_DOUBLED_PAIRS
 * pairs in total, so an isolated "ee" or "oo" is left alone.
 *
 * @example
 * foldDoubledLetters("Tthhee Ssttiirrrreerr") // "The Stirrer"
 * foldDoubledLetters("bookkeeper")            // "bookkeeper"
 */
export function foldDoubledLetters(text: string): string {
  const words: LetterRun[] = [];
  for (const match of text.matchAll(LETTER_RUN_PATTERN)) {
    const start = match.index ?? 0;
    words.push({
      start,
      end: start + match[0].length,
      chars: Array.from(match[0]),
    });
  }

  const foldable = new Set<LetterRun>();
  let run: LetterRun[] = [];
  let runPairs = 0;

  const closeRun = (): void => {
    if (runPairs >= MIN_DOUBLED_PAIRS) {
      for (const word of run) {
        foldable.add(word);
      }
    }
    run = [];
    runPairs = 0;
  };

  for (const word of words) {
    if (isPairDoubled(word.chars)) {
      run.push(word);
      runPairs += word.chars.length / 2;
    } else {
      closeRun();
    }
  }
  closeRun();

  if (foldable.size === 0) {
    return text;
  }

  let result = "";
  let cursor = 0;
  for (const word of words) {
    if (!foldable.has(word)) {
      continue;
    }
    result += text.slice(cursor, word.start) + foldPairs(word.chars);
    cursor = word.end;
  }
  return result + text.slice(cursor);
}

/**
 * Replaces "(cid:72)"-style font placeholders with a single space
 */
export function stripCidPlaceholders(text: string): string {
  return text.replace(CID_PLACEHOLDER_PATTERN, " ");
}

/**
 * Joins line-break hyphenation ("nitro-\ngen" → "nitrogen") and
 * collapses every whitespace run to one space
 */
export function collapseWhitespace(text: string): string {
  return text
    .replace(LINE_BREAK_HYPHENATION_PATTERN, "$1$2")
    .replace(WHITESPACE_RUN_PATTERN, " ")
    .trim();
}

/**
 * Joins a spelled-out word: at least four single letters separated by
 * spaces, every letter after the first lower-case
 */
export function joinSpacedLetters(text: string): string {
  return text.replace(SPACED_LETTERS_PATTERN, (run) => run.replace(/ /g, ""));
}

/**
 * Normalizes raw page text. Total: non-string input yields "".
 *
 * @example
 * normalizeText("Tthhee Ssttiirrrreerr (cid:3) mixes nitro-\ngen")
 * // "The Stirrer mixes nitrogen"
 */
export function normalizeText(text: unknown): string {
  if (typeof text !== "string") {
    return "";
  }
  const folded = foldDoubledLetters(text);
  const withoutPlaceholders = stripCidPlaceholders(folded);
  const collapsed = collapseWhitespace(withoutPlaceholders);
  return joinSpacedLetters(collapsed);
}

/**
 * Validation profiles and rule patterns
 *
 * Profiles vary thresholds only; every profile runs the same rule list.
 */

import type { ValidationProfile, ValidationProfileName } from "@/types";

const DEFAULT_PROFILE: ValidationProfile = {
  name: "default",
  minLength: 3,
  maxLength: 100,
  minWordCount: 1,
  maxWordCount: 4,
  maxSymbolRatio: 0.3,
  rejectPureNumbers: true,
  rejectPercentages: true,
  minAcronymLength: 2,
  maxAcronymLength: 8,
  maxCaseTransitions: 3,
};

export const VALIDATION_PROFILES: Readonly<
  Record<ValidationProfileName, ValidationProfile>
> = {
  default: DEFAULT_PROFILE,
  strict: {
    name: "strict",
    minLength: 4,
    maxLength: 80,
    minWordCount: 1,
    maxWordCount: 3,
    maxSymbolRatio: 0.2,
    rejectPureNumbers: true,
    rejectPercentages: true,
    minAcronymLength: 2,
    maxAcronymLength: 6,
    maxCaseTransitions: 3,
  },
  lenient: {
    name: "lenient",
    minLength: 2,
    maxLength: 150,
    minWordCount: 1,
    maxWordCount: 6,
    maxSymbolRatio: 0.4,
    rejectPureNumbers: true,
    rejectPercentages: true,
    minAcronymLength: 1,
    maxAcronymLength: 10,
    maxCaseTransitions: 4,
  },
  // Longer compounds and acronyms common in engineering documents
  technical: {
    ...DEFAULT_PROFILE,
    name: "technical",
    maxWordCount: 5,
    maxAcronymLength: 10,
  },
  // Standards codes carry numbers and punctuation ("IEC 61508-2:2010")
  standards: {
    ...DEFAULT_PROFILE,
    name: "standards",
    maxLength: 120,
    maxWordCount: 6,
    maxSymbolRatio: 0.35,
    rejectPureNumbers: false,
    maxAcronymLength: 12,
  },
  // Long multi-word scientific terminology
  academic: {
    ...DEFAULT_PROFILE,
    name: "academic",
    minLength: 4,
    maxLength: 150,
    maxWordCount: 8,
    maxSymbolRatio: 0.25,
  },
};

export const PROFILE_DESCRIPTIONS: Readonly<
  Record<ValidationProfileName, string>
> = {
  default: "Balanced validation suitable for most documents.",
  strict: "High-quality glossaries: shorter terms, fewer symbols, more rejections.",
  lenient: "Accepts more terms. Suited to a first extraction pass.",
  technical: "Technical documentation with longer compounds and acronyms.",
  standards: "Industry standards (DIN, ISO, ASME) whose codes contain numbers.",
  academic: "Academic and scientific terminology with long multi-word terms.",
};

export const DEFAULT_PROFILE_NAME: ValidationProfileName = "default";

/**
 * Reported for empty or non-string input
 */
export const INVALID_INPUT_REASON = "empty or non-string term";

/**
 * Characters that never count as symbols in the symbol ratio
 */
export const NON_SYMBOL_PUNCTUATION: ReadonlySet<string> = new Set([
  "-",
  "'",
  "\u2019",
  "\u2010",
  "\u2011",
]);

export const PURE_NUMBER_PATTERNS: readonly RegExp[] = [
  /^[+-]?\d+(?:[.,]\d+)*$/,
  /^[+-]?\d+\.?\d*e[+-]?\d+$/i,
];

export const PERCENTAGE_PATTERNS: readonly RegExp[] = [
  /^[+-]?\d+(?:[.,]\d+)?\s*%$/,
  /^[+-]?\d+(?:[.,]\d+)?\s*(?:percent|per cent|prozent)$/i,
];

/**
 * Encoding placeholders, PDF internals, citation markers and section
 * headings that leak into extracted text
 */
export const DOCUMENT_ARTIFACT_PATTERNS: readonly RegExp[] = [
  /\bcid:\d+/i,
  /^(?:obj|endobj|stream|endstream|xref|startxref|trailer)$/i,
  /^\d+\s+\d+\s+(?:obj|R)\b/,
  /\bet\s*al\.?$/i,
  /\bibid\.?$/i,
  // Bare year
  /^(?:1[5-9]|20)\d{2}$/,
  /^pp?\.\s*\d+/i,
  // Page range
  /^\d+\s*[-–]\s*\d+$/,
  // Dotted section numbering: "5.4 Example D", "3.1.2"
  /^\d+(?:\.\d+)+\.?(?:\s|$)/,
  // Numbered list/heading: "3. Introduction"
  /^\d+\.\s+\p{L}/u,
  /^(?:section|chapter|figure|fig\.|table|appendix|annex|page|abschnitt|kapitel|abbildung|abb\.|tabelle|anhang|seite)\s*\d/i,
];

/**
 * A token starting or ending with a hyphen ("Mem- brane", "-able")
 */
export const DANGLING_HYPHEN_PATTERN =
  /(?:^|\s)[-\u2010\u2011]|[-\u2010\u2011](?:\s|$)/u;

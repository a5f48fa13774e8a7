/**
 * Validation chain type definitions
 */

import type { Lexicon } from "./lexicon";

/**
 * Stable identifiers of the validation rules, in evaluation order.
 * "input" is reported for empty or non-string terms before any rule runs.
 */
export type RuleName =
  | "input"
  | "control_characters"
  | "length_bounds"
  | "pure_number"
  | "symbol_ratio"
  | "word_count"
  | "stop_word"
  | "leading_determiner"
  | "fragment_starter"
  | "standalone_morpheme"
  | "generic_word"
  | "ocr_duplication"
  | "document_artifact"
  | "broken_hyphenation"
  | "capitalization";

/**
 * Outcome of validating one term. `reason` is a stable, human-readable
 * rejection category and is never null on rejection.
 */
export type ValidationVerdict =
  | { accepted: true; reason: null; rule: null }
  | { accepted: false; reason: string; rule: RuleName };

export type ValidationProfileName =
  | "strict"
  | "default"
  | "lenient"
  | "technical"
  | "standards"
  | "academic";

/**
 * Threshold set shared by all rules. Profiles vary values only; the rule
 * list itself is the same for every profile.
 */
export type ValidationProfile = {
  name: ValidationProfileName;
  minLength: number;
  maxLength: number;
  minWordCount: number;
  maxWordCount: number;
  /** Max share of non-alphanumeric characters (whitespace, hyphens, apostrophes excluded) */
  maxSymbolRatio: number;
  rejectPureNumbers: boolean;
  rejectPercentages: boolean;
  minAcronymLength: number;
  maxAcronymLength: number;
  /** Max lower/upper case switches inside a single token */
  maxCaseTransitions: number;
};

/**
 * Immutable inputs shared by every rule invocation
 */
export type RuleContext = {
  profile: ValidationProfile;
  lexicon: Lexicon;
};

/**
 * A named predicate. `passes` returns false to reject with `reason`.
 */
export interface ValidationRule {
  readonly name: Exclude<RuleName, "input">;
  readonly reason: string;
  passes(term: string, ctx: RuleContext): boolean;
}

/**
 * Verdict plus the outcome of every rule in the chain. Unlike validate(),
 * rules after the first failure still run, so one term can show several
 * failures. Empty for invalid input.
 */
export type ValidationDetails = {
  verdict: ValidationVerdict;
  details: Partial<Record<ValidationRule["name"], boolean>>;
};

export type ProfileSummary = {
  name: ValidationProfileName;
  description: string;
};

export type RejectedTerm = {
  term: string;
  reason: string;
  rule: RuleName;
};

/**
 * Diagnostics report for a batch of terms
 */
export type BatchValidationReport = {
  total: number;
  accepted: string[];
  rejected: RejectedTerm[];
  /** Rejection reason -> count */
  rejectionCounts: Record<string, number>;
};

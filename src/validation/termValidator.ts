/**
 * Term validator: runs the rule chain under one profile and lexicon
 *
 * Validation never throws on malformed input and has no side effects;
 * the same term always yields the same verdict.
 */

import type {
  BatchValidationReport,
  Lexicon,
  ProfileSummary,
  RuleContext,
  ValidationProfile,
  ValidationProfileName,
  ValidationDetails,
  ValidationRule,
  ValidationVerdict,
} from "@/types";
import {
  DEFAULT_PROFILE_NAME,
  INVALID_INPUT_REASON,
  PROFILE_DESCRIPTIONS,
  VALIDATION_PROFILES,
} from "@/constants/validation";
import { RULES } from "./rules";

export type TermValidatorOptions = {
  lexicon: Lexicon;
  profile?: ValidationProfileName | ValidationProfile;
  /** Replaces the standard rule list (tests, custom chains) */
  rules?: readonly ValidationRule[];
};

export interface TermValidator {
  readonly profile: ValidationProfile;
  validate(term: unknown): ValidationVerdict;
  validateWithReason(term: unknown): ValidationVerdict;
  validateWithDetails(term: unknown): ValidationDetails;
  isValidTerm(term: unknown): boolean;
  batchValidate(terms: readonly unknown[]): BatchValidationReport;
}

const ACCEPTED: ValidationVerdict = { accepted: true, reason: null, rule: null };
const INVALID_INPUT: ValidationVerdict = {
  accepted: false,
  reason: INVALID_INPUT_REASON,
  rule: "input",
};

function isNonBlankString(term: unknown): term is string {
  return typeof term === "string" && term.trim().length > 0;
}

/**
 * Every profile with a one-line description, in definition order
 */
export function listProfiles(): ProfileSummary[] {
  return Object.values(VALIDATION_PROFILES).map((profile) => ({
    name: profile.name,
    description: PROFILE_DESCRIPTIONS[profile.name],
  }));
}

export function resolveProfile(
  profile: ValidationProfileName | ValidationProfile | undefined,
): ValidationProfile {
  if (profile === undefined) {
    return VALIDATION_PROFILES[DEFAULT_PROFILE_NAME];
  }
  return typeof profile === "string" ? VALIDATION_PROFILES[profile] : profile;
}

/**
 * Creates a validator bound to a profile and a language lexicon.
 *
 * @example
 * const validator = createTermValidator({ lexicon: loadLexicon("en") });
 * validator.validate("Pressure Transmitter"); // { accepted: true, ... }
 * validator.validate("[%]");
 * // { accepted: false, rule: "symbol_ratio", reason: "symbol-only or high symbol ratio" }
 */
export function createTermValidator(
  options: TermValidatorOptions,
): TermValidator {
  const profile = resolveProfile(options.profile);
  const rules = options.rules ?? RULES;
  const ctx: RuleContext = { profile, lexicon: options.lexicon };

  const validate = (term: unknown): ValidationVerdict => {
    if (!isNonBlankString(term)) {
      return INVALID_INPUT;
    }
    for (const rule of rules) {
      if (!rule.passes(term, ctx)) {
        return { accepted: false, reason: rule.reason, rule: rule.name };
      }
    }
    return ACCEPTED;
  };

  const validateWithDetails = (term: unknown): ValidationDetails => {
    if (!isNonBlankString(term)) {
      return { verdict: INVALID_INPUT, details: {} };
    }
    const details: ValidationDetails["details"] = {};
    let verdict: ValidationVerdict = ACCEPTED;
    for (const rule of rules) {
      const passed = rule.passes(term, ctx);
      details[rule.name] = passed;
      if (!passed && verdict.accepted) {
        verdict = { accepted: false, reason: rule.reason, rule: rule.name };
      }
    }
    return { verdict, details };
  };

  const batchValidate = (terms: readonly unknown[]): BatchValidationReport => {
    const report: BatchValidationReport = {
      total: terms.length,
      accepted: [],
      rejected: [],
      rejectionCounts: {},
    };
    for (const term of terms) {
      const verdict = validate(term);
      if (verdict.accepted) {
        // Only strings can be accepted
        report.accepted.push(String(term));
        continue;
      }
      report.rejected.push({
        term: typeof term === "string" ? term : String(term),
        reason: verdict.reason,
        rule: verdict.rule,
      });
      report.rejectionCounts[verdict.reason] =
        (report.rejectionCounts[verdict.reason] ?? 0) + 1;
    }
    return report;
  };

  return {
    profile,
    validate,
    validateWithReason: validate,
    validateWithDetails,
    isValidTerm: (term) => validate(term).accepted,
    batchValidate,
  };
}

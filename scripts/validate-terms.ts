#!/usr/bin/env tsx
/**
 * Validate a list of terms (one per line) and print the rejection breakdown
 *
 * Usage:
 *   npm run validate-terms -- terms.txt [profile]
 *   npm run validate-terms -- --profiles
 *
 * GLOSSARY_LANGUAGE selects the lexicon (defaults to en).
 *
 * Besides the first rejection reason per term, every rule runs on every
 * term: "Rule failures" counts how often each rule fails overall, so a
 * threshold change can be judged before it is made.
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { loadPipelineConfig } from "@/config/env";
import { loadLexicon } from "@/lexicon";
import { createTermValidator, listProfiles } from "@/validation";

const [file, profileArg] = process.argv.slice(2);

if (file === "--profiles") {
  for (const { name, description } of listProfiles()) {
    console.log(`${name.padEnd(10)} ${description}`);
  }
  process.exit(0);
}

if (!file) {
  console.error("Usage: validate-terms <terms.txt> [profile] | --profiles");
  process.exit(1);
}

const config = loadPipelineConfig(
  profileArg ? { ...process.env, VALIDATION_PROFILE: profileArg } : process.env,
);
const validator = createTermValidator({
  lexicon: loadLexicon(config.language),
  profile: config.profile,
});

const terms = readFileSync(file, "utf-8")
  .split(/\r?\n/)
  .filter((line) => line.trim().length > 0);

const report = validator.batchValidate(terms);

const ruleFailures: Record<string, number> = {};
for (const term of terms) {
  for (const [rule, passed] of Object.entries(
    validator.validateWithDetails(term).details,
  )) {
    if (!passed) {
      ruleFailures[rule] = (ruleFailures[rule] ?? 0) + 1;
    }
  }
}

console.log(`Profile: ${validator.profile.name} (${config.language})`);
console.log(`Total: ${report.total}`);
console.log(`Accepted: ${report.accepted.length}`);
console.log(`Rejected: ${report.rejected.length}`);
for (const [reason, count] of Object.entries(report.rejectionCounts)) {
  console.log(`  ${reason}: ${count}`);
}
console.log("Rule failures:");
for (const [rule, count] of Object.entries(ruleFailures)) {
  console.log(`  ${rule}: ${count}`);
}
for (const entry of report.rejected) {
  console.log(`  - ${entry.term} (${entry.reason})`);
}

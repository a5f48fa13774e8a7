/**
 * Environment configuration
 *
 * Reads pipeline settings from environment variables (loaded from .env by
 * the entrypoints via dotenv). Invalid values fail fast.
 */

import type { Language, ValidationProfileName } from "@/types";
import { DEFAULT_LANGUAGE } from "@/constants/lexicon";
import {
  DEFAULT_DOCUMENT_TIMEOUT_MS,
  DEFAULT_MIN_FREQUENCY,
  DEFAULT_PAGE_CONCURRENCY,
} from "@/constants/extraction";
import {
  DEFAULT_PROFILE_NAME,
  VALIDATION_PROFILES,
} from "@/constants/validation";
import { isLanguage } from "@/utils/language";

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

export type PipelineConfig = {
  language: Language;
  profile: ValidationProfileName;
  pageConcurrency: number;
  documentTimeoutMs: number;
  minFrequency: number;
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function isProfileName(value: string): value is ValidationProfileName {
  return Object.hasOwn(VALIDATION_PROFILES, value);
}

/**
 * @example
 * loadPipelineConfig({ GLOSSARY_LANGUAGE: "de", VALIDATION_PROFILE: "strict" })
 * // { language: "de", profile: "strict", pageConcurrency: 4, ... }
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const language = env.GLOSSARY_LANGUAGE?.trim().toLowerCase() || DEFAULT_LANGUAGE;
  if (!isLanguage(language)) {
    throw new ConfigError(`GLOSSARY_LANGUAGE "${language}" is not supported`);
  }

  const profile = env.VALIDATION_PROFILE?.trim().toLowerCase() || DEFAULT_PROFILE_NAME;
  if (!isProfileName(profile)) {
    throw new ConfigError(
      `VALIDATION_PROFILE must be one of ${Object.keys(VALIDATION_PROFILES).join(", ")}, got "${profile}"`,
    );
  }

  return {
    language,
    profile,
    pageConcurrency: readPositiveInt(env, "PAGE_CONCURRENCY", DEFAULT_PAGE_CONCURRENCY),
    documentTimeoutMs: readPositiveInt(
      env,
      "DOCUMENT_TIMEOUT_MS",
      DEFAULT_DOCUMENT_TIMEOUT_MS,
    ),
    minFrequency: readPositiveInt(env, "MIN_TERM_FREQUENCY", DEFAULT_MIN_FREQUENCY),
  };
}

/**
 * Language code helpers
 */

import type { Language } from "@/types";
import { SUPPORTED_LANGUAGES } from "@/constants/lexicon";

export function isLanguage(value: unknown): value is Language {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

/**
 * @throws Error if the value is not a supported language code
 */
export function parseLanguage(value: string, source: string): Language {
  if (!isLanguage(value)) {
    throw new Error(
      `Unsupported language in ${source}: "${value}" (expected ${SUPPORTED_LANGUAGES.join(", ")})`,
    );
  }
  return value;
}

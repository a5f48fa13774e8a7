/**
 * Lexicon constants
 */

import type { Language } from "@/types";

/**
 * Directory holding <language>.json lexicon files, relative to project root
 */
export const LEXICON_DIR = "data/lexicons";

export const SUPPORTED_LANGUAGES: readonly Language[] = ["en", "de"];

export const DEFAULT_LANGUAGE: Language = "en";

/**
 * Used when a lexicon file sets no maxLetterRepeat. A longer run of one
 * lower-case letter is treated as OCR duplication ("Stirrrer").
 */
export const DEFAULT_MAX_LETTER_REPEAT = 2;

/**
 * Candidate generation constants
 */

/**
 * Sentence boundary: terminal punctuation followed by whitespace and an
 * upper-case letter or digit
 */
export const SENTENCE_BOUNDARY_PATTERN = /(?<=[.!?])\s+(?=[\p{Lu}\p{N}])/u;

/**
 * Characters on either side of an occurrence kept as context
 */
export const CONTEXT_WINDOW_CHARS = 100;

/**
 * Sentences longer than this are cut around the occurrence
 */
export const MAX_SENTENCE_LENGTH = 300;

/**
 * Two or more capitalized words ("Pressure Transmitter", "Überdruckventil
 * Gehäuse"). Edges are letter-aware lookarounds: `\b` only knows ASCII
 * word characters. A hyphen at either edge rejects the match so compounds
 * are left whole to HYPHENATED_COMPOUND_PATTERN.
 */
export const CAPITALIZED_SEQUENCE_PATTERN =
  /(?<![\p{L}\p{N}-])\p{Lu}[\p{Ll}\p{Lu}]+(?:[ \t]+\p{Lu}[\p{Ll}\p{Lu}]+)+(?![\p{L}\p{N}-])/gu;

/**
 * Acronyms of two or more capitals, optional trailing digits ("PLC", "SIL2",
 * "ÖNORM")
 */
export const ACRONYM_PATTERN = /(?<![\p{L}\p{N}])\p{Lu}{2,}\d*(?![\p{L}\p{N}])/gu;

/**
 * Hyphenated compounds ("fail-safe", "Öl-Abscheider")
 */
export const HYPHENATED_COMPOUND_PATTERN =
  /(?<![\p{L}\p{N}])\p{L}+(?:-\p{L}+)+(?![\p{L}\p{N}])/gu;

/**
 * Standards codes ("ISO 9001", "IEC 61508-2", "DIN EN 60079-10-1:2016")
 */
export const STANDARDS_CODE_PATTERN =
  /(?<![\p{L}\p{N}])(?:ISO|IEC|DIN|EN|ASME|ANSI|IEEE|NAMUR|VDI|VDE|API|NFPA)(?:\s+(?:ISO|IEC|EN|NE))?(?:\/(?:ISO|IEC|EN))?\s+\d+(?:-\d+)*(?::\d{4})?(?![\p{L}\p{N}])/gu;

/**
 * Punctuation trimmed from the edges of analyzer phrases
 */
export const EDGE_PUNCTUATION_PATTERN = /^[\s"'“”‘’(\[{,;:.!?]+|[\s"'“”‘’)\]},;:.!?]+$/g;

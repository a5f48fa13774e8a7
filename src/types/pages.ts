/**
 * Page type definitions
 *
 * Page-indexed text handed over by the document text extraction layer.
 */

/**
 * Text of a single document page as produced by PDF/OCR extraction.
 * Page numbers are 1-based.
 */
export type RawPage = {
  pageNumber: number;
  text: string;
};

/**
 * Upstream extraction could not produce text for this page.
 * The page is skipped; the rest of the document proceeds.
 */
export type PageExtractionFailure = {
  pageNumber: number;
  error: string;
};

export type DocumentPage = RawPage | PageExtractionFailure;

/**
 * Same shape as RawPage, text cleaned by the normalizer
 */
export type NormalizedPage = RawPage;

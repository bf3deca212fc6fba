/**
 * Defaults for HeaderFooterDetector
 */
export const HEADER_FOOTER = {
  /**
   * A line must be a page's first or last line at least this many times
   */
  MIN_OCCURRENCES: 10,

  /**
   * Noise lines are shorter than this many characters
   */
  MAX_LENGTH: 60,
} as const;

/**
 * Defaults for PageClassifier
 */
export const TOC_PAGE = {
  /**
   * Only pages with an index below this limit are checked for TOC layout
   */
  PAGE_LIMIT: 20,

  /**
   * Share of non-blank lines that must look like TOC entries (exclusive)
   */
  LINE_RATIO: 0.3,
} as const;

/**
 * Defaults for UnicodeNormalizer
 */
export const UNICODE_NORMALIZER = {
  /**
   * Pages normalized per batch (0 = sequential)
   */
  BATCH_SIZE: 10,
} as const;

/**
 * Heading text emitted ahead of a detected table of contents
 */
export const TOC_HEADING = 'Table of Contents';

/**
 * How many trailing blocks are searched for an existing TOC heading.
 * The heading and the blank line after it occupy two of them.
 */
export const TOC_HEADING_LOOKBACK = 6;

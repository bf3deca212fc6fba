import { TOC_PAGE } from '../config/constants';

/**
 * Dotted leader of four or more periods
 */
export const DOT_LEADER_PATTERN = /\.{4,}/;

/**
 * Line ending in a run of digits
 */
export const TRAILING_NUMBER_PATTERN = /\d+\s*$/;

export type PageKind = 'toc' | 'content';

/**
 * PageClassifier options
 */
export interface PageClassifierOptions {
  /**
   * Only pages with a 0-based index below this are TOC candidates (default: 20)
   */
  pageLimit?: number;

  /**
   * Share of dotted or number-ending lines above which a page is a TOC (default: 0.3)
   */
  lineRatio?: number;
}

/**
 * PageClassifier
 *
 * Decides whether a page is a table-of-contents page from the density of
 * dotted leaders and trailing page numbers. Pages beyond `pageLimit` are
 * always content, even when they look like a TOC.
 */
export class PageClassifier {
  private readonly pageLimit: number;
  private readonly lineRatio: number;

  constructor(options?: PageClassifierOptions) {
    this.pageLimit = options?.pageLimit ?? TOC_PAGE.PAGE_LIMIT;
    this.lineRatio = options?.lineRatio ?? TOC_PAGE.LINE_RATIO;
  }

  classify(text: string, pageIndex: number): PageKind {
    if (pageIndex < this.pageLimit && this.isTocPage(text)) {
      return 'toc';
    }
    return 'content';
  }

  isTocPage(text: string): boolean {
    const lines = text
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    if (lines.length === 0) {
      return false;
    }

    const dotLines = lines.filter((line) => DOT_LEADER_PATTERN.test(line)).length;
    const numberLines = lines.filter((line) =>
      TRAILING_NUMBER_PATTERN.test(line),
    ).length;

    return (
      dotLines / lines.length > this.lineRatio ||
      numberLines / lines.length > this.lineRatio
    );
  }
}

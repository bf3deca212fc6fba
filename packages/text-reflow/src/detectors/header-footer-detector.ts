import type { LoggerMethods } from '@pagemark/logger';

import { HEADER_FOOTER } from '../config/constants';

/**
 * HeaderFooterDetector options
 */
export interface HeaderFooterDetectorOptions {
  /**
   * Minimum number of times a line must open or close a page (default: 10)
   */
  minOccurrences?: number;

  /**
   * Noise lines are shorter than this (default: 60)
   */
  maxLength?: number;
}

/**
 * HeaderFooterDetector
 *
 * Finds running headers and footers by tallying the first and last
 * non-blank line of every page across the whole document. The tally is
 * global, so detection must see every page before any page is reflowed.
 */
export class HeaderFooterDetector {
  private readonly minOccurrences: number;
  private readonly maxLength: number;

  constructor(
    private readonly logger: LoggerMethods,
    options?: HeaderFooterDetectorOptions,
  ) {
    this.minOccurrences = options?.minOccurrences ?? HEADER_FOOTER.MIN_OCCURRENCES;
    this.maxLength = options?.maxLength ?? HEADER_FOOTER.MAX_LENGTH;
  }

  /**
   * Build the noise set for a document.
   *
   * @param pages - Normalized page texts in document order
   */
  detect(pages: readonly string[]): ReadonlySet<string> {
    const counts = new Map<string, number>();

    for (const page of pages) {
      const lines = page
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

      // Single-line pages have no distinct header and footer
      if (lines.length < 2) {
        continue;
      }

      for (const edge of [lines[0], lines[lines.length - 1]]) {
        counts.set(edge, (counts.get(edge) ?? 0) + 1);
      }
    }

    const noise = new Set<string>();
    for (const [line, count] of counts) {
      if (count >= this.minOccurrences && line.length < this.maxLength) {
        noise.add(line);
        this.logger.info(
          `[HeaderFooterDetector] Removing header/footer (${count}x): ${line.slice(0, 50)}`,
        );
      }
    }

    this.logger.debug(
      `[HeaderFooterDetector] ${noise.size} noise lines across ${pages.length} pages`,
    );

    return noise;
  }
}

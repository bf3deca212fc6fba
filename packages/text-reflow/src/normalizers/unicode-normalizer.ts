import { BatchProcessor } from '@pagemark/shared';

import replacements from '../data/unicode-replacements.json';

const REPLACEMENTS: ReadonlyMap<string, string> = new Map(
  Object.entries(replacements),
);

/**
 * Emoji, pictograph and symbol blocks removed outright
 */
const EMOJI_PATTERN =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{1F900}-\u{1F9FF}\u{2600}-\u{27BF}\u{1F200}-\u{1F2FF}\u{1F000}-\u{1F02F}\u{1F0A0}-\u{1F0FF}]+/gu;

const NON_ASCII_PATTERN = /[^\x00-\x7F]/gu;

/**
 * UnicodeNormalizer - ASCII folding of extracted page text
 *
 * - Typographic punctuation, spaces and symbols map to ASCII equivalents
 * - Emoji and pictographs are removed
 * - Any other character at or above U+0080 is removed
 *
 * Newlines, tabs and carriage returns are kept. The result is ASCII only,
 * so normalizing twice gives the same text as normalizing once.
 */
export class UnicodeNormalizer {
  static normalize(text: string): string {
    if (!text) return '';

    let normalized = text.replace(
      NON_ASCII_PATTERN,
      (char) => REPLACEMENTS.get(char) ?? char,
    );

    normalized = normalized.replace(EMOJI_PATTERN, '');

    return normalized.replace(NON_ASCII_PATTERN, '');
  }

  /**
   * Normalize many page texts, batch by batch.
   *
   * @param texts - Page texts in document order
   * @param batchSize - Pages per batch (default: 10). 0 processes all pages as one batch.
   */
  static normalizeBatch(texts: string[], batchSize: number = 10): string[] {
    return BatchProcessor.processBatchSync(texts, batchSize, (batch) =>
      batch.map((text) => this.normalize(text)),
    );
  }
}

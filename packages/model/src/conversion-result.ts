import type { MarkdownBlock } from './markdown-block';

/**
 * Summary figures reported after a conversion
 */
export interface ConversionStats {
  /**
   * Pages that carried text and took part in the conversion
   */
  pageCount: number;

  /**
   * Number of lines in the final Markdown
   */
  lineCount: number;

  /**
   * Number of characters in the final Markdown
   */
  characterCount: number;
}

/**
 * Complete result of converting page texts into Markdown
 */
export interface ConversionResult {
  /**
   * Final Markdown text
   */
  markdown: string;

  /**
   * Emitted blocks, in order, before the final whitespace pass
   */
  blocks: MarkdownBlock[];

  /**
   * Lines recognised as running headers and footers
   */
  noise: ReadonlySet<string>;

  /**
   * 0-based indices (among retained pages) rendered as table of contents
   */
  tocPages: number[];

  stats: ConversionStats;
}

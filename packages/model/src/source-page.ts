/**
 * Raw text of one physical page, as produced by text extraction
 *
 * @interface SourcePage
 */
export interface SourcePage {
  /**
   * 1-based page number in the source document
   */
  pageNo: number;

  /**
   * Extracted text, one line per physical line
   */
  text: string;
}

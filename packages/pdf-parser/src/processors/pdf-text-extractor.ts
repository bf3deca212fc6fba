import type { LoggerMethods } from '@pagemark/logger';
import type { SourcePage } from '@pagemark/model';
import type { SpawnResult } from '@pagemark/shared';

import { spawnAsync } from '@pagemark/shared';

import { PdfExtractError } from '../errors/pdf-extract-error';

/**
 * PdfTextExtractor options
 */
export interface PdfTextExtractorOptions {
  /**
   * Pass `-layout` to pdftotext (default: false).
   * Reflow expects plain character streams, so layout mode is off by default.
   */
  layout?: boolean;
}

/**
 * Extracts text from PDF pages using the pdftotext command-line tool.
 *
 * Any failure is fatal: the error propagates as a {@link PdfExtractError}.
 *
 * ## System Requirements
 * - Poppler utils (`brew install poppler`, `apt install poppler-utils`)
 */
export class PdfTextExtractor {
  private readonly layout: boolean;

  constructor(
    private readonly logger: LoggerMethods,
    options?: PdfTextExtractorOptions,
  ) {
    this.layout = options?.layout ?? false;
  }

  /**
   * Extract text from every page of a PDF, in page order.
   *
   * @throws {PdfExtractError} When the page count or any page text cannot be read
   */
  async extractPages(pdfPath: string): Promise<SourcePage[]> {
    const totalPages = await this.getPageCount(pdfPath);

    this.logger.info(
      `[PdfTextExtractor] Extracting text from ${totalPages} pages...`,
    );

    const pages: SourcePage[] = [];
    for (let pageNo = 1; pageNo <= totalPages; pageNo++) {
      const text = await this.extractPageText(pdfPath, pageNo);
      pages.push({ pageNo, text });
    }

    const nonEmptyCount = pages.filter(
      (page) => page.text.trim().length > 0,
    ).length;
    this.logger.info(
      `[PdfTextExtractor] Extracted text from ${nonEmptyCount}/${totalPages} pages`,
    );

    return pages;
  }

  /**
   * Get total page count of a PDF using pdfinfo.
   *
   * @throws {PdfExtractError} When pdfinfo fails or reports no pages
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await this.run('pdfinfo', [pdfPath]);
    if (result.code !== 0) {
      throw new PdfExtractError(
        `pdfinfo failed for ${pdfPath}: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    const pageCount = match ? parseInt(match[1], 10) : 0;
    if (pageCount === 0) {
      throw new PdfExtractError(`No pages found in ${pdfPath}`);
    }
    return pageCount;
  }

  /**
   * Extract text from a single PDF page using pdftotext.
   *
   * @throws {PdfExtractError} When pdftotext exits with a non-zero code
   */
  async extractPageText(pdfPath: string, page: number): Promise<string> {
    const args = [
      '-f',
      page.toString(),
      '-l',
      page.toString(),
      '-enc',
      'UTF-8',
    ];
    if (this.layout) {
      args.push('-layout');
    }
    args.push(pdfPath, '-');

    const result = await this.run('pdftotext', args);
    if (result.code !== 0) {
      throw new PdfExtractError(
        `pdftotext failed for page ${page}: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    // pdftotext terminates every page with a form feed
    return result.stdout.replace(/\f$/, '');
  }

  private async run(command: string, args: string[]): Promise<SpawnResult> {
    try {
      return await spawnAsync(command, args);
    } catch (error) {
      throw PdfExtractError.fromError(`Failed to run ${command}`, error);
    }
  }
}

import type { LoggerMethods } from '@pagemark/logger';
import type {
  ConversionResult,
  ConversionStats,
  MarkdownBlock,
  SourcePage,
} from '@pagemark/model';

import type {
  ConversionOptions,
  ConversionOptionsInput,
} from './config/conversion-options';

import { PageClassifier } from './classifiers/page-classifier';
import { resolveConversionOptions } from './config/conversion-options';
import { HeaderFooterDetector } from './detectors/header-footer-detector';
import { UnicodeNormalizer } from './normalizers/unicode-normalizer';
import { ReflowEngine } from './reflow/reflow-engine';
import { MarkdownRenderer } from './renderers/markdown-renderer';

/**
 * DocumentConverter Options
 */
export type DocumentConverterOptions = ConversionOptionsInput & {
  /**
   * Logger instance
   */
  logger: LoggerMethods;
};

/**
 * DocumentConverter
 *
 * Converts extracted page texts into Markdown.
 *
 * ## Conversion Process
 *
 * 1. Drop pages without text
 * 2. Normalize every page to ASCII
 * 3. Detect running headers and footers over all pages
 * 4. Per page, in order: render TOC pages as entries, reflow the rest
 * 5. Flush open text and apply the final whitespace pass
 *
 * @example
 * ```typescript
 * const converter = new DocumentConverter({ logger });
 * const { markdown } = converter.convertTexts(['PAGE ONE TITLE\nbody text']);
 * ```
 *
 * @throws {ConversionOptionsError} From the constructor when options are invalid
 */
export class DocumentConverter {
  private readonly logger: LoggerMethods;
  private readonly options: ConversionOptions;
  private readonly pageClassifier: PageClassifier;
  private readonly headerFooterDetector: HeaderFooterDetector;

  constructor({ logger, ...options }: DocumentConverterOptions) {
    this.logger = logger;
    this.options = resolveConversionOptions(options);
    this.pageClassifier = new PageClassifier({
      pageLimit: this.options.tocPageLimit,
      lineRatio: this.options.tocLineRatio,
    });
    this.headerFooterDetector = new HeaderFooterDetector(logger, {
      minOccurrences: this.options.noiseMinOccurrences,
      maxLength: this.options.noiseMaxLength,
    });
  }

  /**
   * Convert plain page texts, given in reading order.
   */
  convertTexts(texts: readonly string[]): ConversionResult {
    return this.convert(texts.map((text, index) => ({ pageNo: index + 1, text })));
  }

  /**
   * Convert extracted pages, given in reading order.
   */
  convert(pages: readonly SourcePage[]): ConversionResult {
    const retained = pages.filter((page) => page.text.trim().length > 0);
    if (retained.length < pages.length) {
      this.logger.info(
        `[DocumentConverter] Skipped empty pages: ${pages.length - retained.length}`,
      );
    }

    this.logger.info(
      `[DocumentConverter] Converting ${retained.length} pages...`,
    );

    const texts = UnicodeNormalizer.normalizeBatch(
      retained.map((page) => page.text),
      this.options.normalizeBatchSize,
    );

    this.logger.info('[DocumentConverter] Detecting headers/footers...');
    const noise = this.headerFooterDetector.detect(texts);
    this.logger.info(
      `[DocumentConverter] Found ${noise.size} header/footer lines`,
    );

    const engine = new ReflowEngine(noise);
    let state = ReflowEngine.initialState();
    const blocks: MarkdownBlock[] = [];
    const tocPages: number[] = [];

    texts.forEach((text, index) => {
      const kind = this.pageClassifier.classify(text, index);
      if (kind === 'toc') {
        tocPages.push(index);
        this.logger.debug(
          `[DocumentConverter] Page ${retained[index].pageNo} is a table of contents page`,
        );
      }

      const step =
        kind === 'toc'
          ? engine.processTocPage(state, text)
          : engine.processContentPage(state, text);
      state = step.state;
      blocks.push(...step.blocks);
    });

    blocks.push(...engine.finish(state).blocks);

    this.logger.info(
      `[DocumentConverter] Detected ${tocPages.length} table of contents pages`,
    );

    const markdown = MarkdownRenderer.render(blocks);
    const stats = this.collectStats(markdown, retained.length);

    this.logger.info(
      `[DocumentConverter] Converted to Markdown: ${stats.lineCount} lines, ${stats.characterCount} characters`,
    );

    return { markdown, blocks, noise, tocPages, stats };
  }

  private collectStats(markdown: string, pageCount: number): ConversionStats {
    const lineCount =
      markdown.length === 0 ? 0 : markdown.replace(/\n$/, '').split('\n').length;
    return { pageCount, lineCount, characterCount: markdown.length };
  }
}

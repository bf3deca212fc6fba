/**
 * @pagemark/text-reflow
 *
 * Turns per-page plain text into structured Markdown.
 *
 * ## Key Features
 *
 * - ASCII normalization of extracted text
 * - Running header/footer detection across the whole document
 * - Table-of-contents page detection and entry reformatting
 * - Heading and list detection from line shape alone
 * - Paragraph reflow with dehyphenation, across page boundaries
 *
 * @packageDocumentation
 */

export { DocumentConverter } from './document-converter';
export type { DocumentConverterOptions } from './document-converter';
export {
  ConversionOptionsSchema,
  resolveConversionOptions,
} from './config/conversion-options';
export type {
  ConversionOptions,
  ConversionOptionsInput,
} from './config/conversion-options';
export { ConversionOptionsError } from './errors/conversion-options-error';
export { UnicodeNormalizer } from './normalizers/unicode-normalizer';
export { HeaderFooterDetector } from './detectors/header-footer-detector';
export type { HeaderFooterDetectorOptions } from './detectors/header-footer-detector';
export {
  PageClassifier,
  DOT_LEADER_PATTERN,
  TRAILING_NUMBER_PATTERN,
} from './classifiers/page-classifier';
export type { PageClassifierOptions, PageKind } from './classifiers/page-classifier';
export {
  LineClassifier,
  HEADING_RULES,
  BULLET_GLYPHS,
} from './classifiers/line-classifier';
export type {
  DetectedHeadingLevel,
  HeadingRule,
  HeadingVerdict,
} from './classifiers/line-classifier';
export { TocLineFormatter, TOC_LINE_RULES } from './formatters/toc-line-formatter';
export type { TocLineRule } from './formatters/toc-line-formatter';
export { ReflowEngine } from './reflow/reflow-engine';
export type { LineStep, ReflowStep } from './reflow/reflow-engine';
export { INITIAL_ACCUMULATOR_STATE } from './reflow/accumulator-state';
export type { AccumulatorState } from './reflow/accumulator-state';
export { joinWithDehyphenation } from './reflow/dehyphenate';
export { MarkdownRenderer } from './renderers/markdown-renderer';

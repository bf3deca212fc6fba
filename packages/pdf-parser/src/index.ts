export { PdfTextExtractor } from './processors/pdf-text-extractor';
export type { PdfTextExtractorOptions } from './processors/pdf-text-extractor';
export { PdfExtractError } from './errors/pdf-extract-error';

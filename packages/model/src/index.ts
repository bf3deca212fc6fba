export type { SourcePage } from './source-page';
export type {
  BlankBlock,
  HeadingBlock,
  HeadingLevel,
  ListItemBlock,
  ListKind,
  MarkdownBlock,
  ParagraphBlock,
  TocEntryBlock,
} from './markdown-block';
export type { ConversionResult, ConversionStats } from './conversion-result';

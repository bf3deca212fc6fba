/**
 * Markdown heading depth. Detection only infers 2 and 3.
 */
export type HeadingLevel = 1 | 2 | 3;

/**
 * Marker style of a list item
 */
export type ListKind = 'bullet' | 'numbered';

export interface HeadingBlock {
  type: 'heading';
  level: HeadingLevel;
  text: string;
}

/**
 * Paragraph text after dehyphenated joining of its line fragments
 */
export interface ParagraphBlock {
  type: 'paragraph';
  text: string;
}

/**
 * List item including its marker (`- `, `1. ` or `1) `)
 */
export interface ListItemBlock {
  type: 'list-item';
  kind: ListKind;
  text: string;
}

/**
 * Table-of-contents line with its locator moved to the front
 */
export interface TocEntryBlock {
  type: 'toc-entry';
  text: string;
}

export interface BlankBlock {
  type: 'blank';
}

/**
 * One emitted unit of the output document
 */
export type MarkdownBlock =
  | HeadingBlock
  | ParagraphBlock
  | ListItemBlock
  | TocEntryBlock
  | BlankBlock;

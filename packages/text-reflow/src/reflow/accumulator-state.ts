import type { ListKind, MarkdownBlock } from '@pagemark/model';

/**
 * Reflow state carried from line to line and across page boundaries.
 *
 * At most one of `paragraph` and `listItem` is non-empty at any time.
 */
export interface AccumulatorState {
  /**
   * Line fragments of the paragraph being built
   */
  readonly paragraph: readonly string[];

  /**
   * Line fragments of the list item being built, marker included
   */
  readonly listItem: readonly string[];

  /**
   * Marker style of `listItem`, null when no item is open
   */
  readonly listKind: ListKind | null;

  readonly inList: boolean;

  /**
   * Context line for heading detection; reset at each page and blank line
   */
  readonly previousLine: string | null;

  /**
   * Most recently emitted blocks, newest last
   */
  readonly recentBlocks: readonly MarkdownBlock[];
}

export const INITIAL_ACCUMULATOR_STATE: AccumulatorState = {
  paragraph: [],
  listItem: [],
  listKind: null,
  inList: false,
  previousLine: null,
  recentBlocks: [],
};

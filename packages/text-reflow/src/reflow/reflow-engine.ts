import type { MarkdownBlock } from '@pagemark/model';

import type { AccumulatorState } from './accumulator-state';

import { takeRight } from 'es-toolkit';

import { LineClassifier } from '../classifiers/line-classifier';
import { TOC_HEADING, TOC_HEADING_LOOKBACK } from '../config/constants';
import { TocLineFormatter } from '../formatters/toc-line-formatter';
import { INITIAL_ACCUMULATOR_STATE } from './accumulator-state';
import { joinWithDehyphenation } from './dehyphenate';

/**
 * New state plus the blocks emitted on the way to it
 */
export interface ReflowStep {
  state: AccumulatorState;
  blocks: MarkdownBlock[];
}

/**
 * Result of consuming one or more lines of a page
 */
export interface LineStep extends ReflowStep {
  /**
   * Index of the first line not yet consumed
   */
  nextIndex: number;
}

const SENTENCE_END = ['.', '!', '?'] as const;
const PARAGRAPH_END = ['.', '!', '?', ':', '"'] as const;

function endsWithAny(line: string, endings: readonly string[]): boolean {
  return endings.some((ending) => line.endsWith(ending));
}

function blockText(block: MarkdownBlock): string {
  return block.type === 'blank' ? '' : block.text;
}

/**
 * Record emitted blocks in the state's recent-block window.
 */
function emit(state: AccumulatorState, blocks: MarkdownBlock[]): ReflowStep {
  if (blocks.length === 0) {
    return { state, blocks };
  }
  return {
    state: {
      ...state,
      recentBlocks: takeRight(
        [...state.recentBlocks, ...blocks],
        TOC_HEADING_LOOKBACK,
      ),
    },
    blocks,
  };
}

function flushList(state: AccumulatorState): ReflowStep {
  if (state.listItem.length === 0 || state.listKind === null) {
    return { state: { ...state, listItem: [], listKind: null }, blocks: [] };
  }
  const block: MarkdownBlock = {
    type: 'list-item',
    kind: state.listKind,
    text: joinWithDehyphenation(state.listItem),
  };
  return {
    state: { ...state, listItem: [], listKind: null },
    blocks: [block],
  };
}

function flushParagraph(
  state: AccumulatorState,
  separate: boolean,
): ReflowStep {
  if (state.paragraph.length === 0) {
    return { state, blocks: [] };
  }
  const blocks: MarkdownBlock[] = [
    { type: 'paragraph', text: joinWithDehyphenation(state.paragraph) },
  ];
  if (separate) {
    blocks.push({ type: 'blank' });
  }
  return { state: { ...state, paragraph: [] }, blocks };
}

/**
 * Flush the open list item, then the open paragraph.
 */
function flushAll(state: AccumulatorState, separate: boolean): ReflowStep {
  const list = flushList(state);
  const paragraph = flushParagraph(list.state, separate);
  return {
    state: paragraph.state,
    blocks: [...list.blocks, ...paragraph.blocks],
  };
}

/**
 * ReflowEngine
 *
 * Turns classified lines into Markdown blocks. Every method is a pure
 * transition from one {@link AccumulatorState} to the next; the open
 * paragraph or list item travels in the state, so it may continue across a
 * page boundary.
 *
 * The noise set is computed once per document and only read here.
 */
export class ReflowEngine {
  constructor(private readonly noise: ReadonlySet<string>) {}

  static initialState(): AccumulatorState {
    return INITIAL_ACCUMULATOR_STATE;
  }

  /**
   * Reflow an ordinary content page.
   */
  processContentPage(state: AccumulatorState, pageText: string): ReflowStep {
    const lines = pageText.split('\n');
    const blocks: MarkdownBlock[] = [];
    let current: AccumulatorState = { ...state, previousLine: null };
    let index = 0;

    while (index < lines.length) {
      const result = this.step(current, lines, index);
      current = result.state;
      blocks.push(...result.blocks);
      index = result.nextIndex;
    }

    return { state: current, blocks };
  }

  /**
   * Render a table-of-contents page, one entry block per line.
   */
  processTocPage(state: AccumulatorState, pageText: string): ReflowStep {
    const flushed = flushAll(state, false);
    let current = emit(flushed.state, flushed.blocks).state;
    const blocks: MarkdownBlock[] = [...flushed.blocks];

    const hasHeading = current.recentBlocks.some((block) =>
      blockText(block).includes(TOC_HEADING),
    );
    const pageBlocks: MarkdownBlock[] = hasHeading
      ? []
      : [
          { type: 'blank' },
          { type: 'heading', level: 2, text: TOC_HEADING },
          { type: 'blank' },
        ];

    for (const rawLine of pageText.split('\n')) {
      const line = rawLine.trim();
      if (line && !this.noise.has(line)) {
        pageBlocks.push({
          type: 'toc-entry',
          text: TocLineFormatter.format(line),
        });
      }
    }
    pageBlocks.push({ type: 'blank' });

    current = emit(current, pageBlocks).state;
    blocks.push(...pageBlocks);

    return {
      state: { ...current, inList: false, previousLine: null },
      blocks,
    };
  }

  /**
   * Flush whatever is still open at the end of the document.
   */
  finish(state: AccumulatorState): ReflowStep {
    const flushed = flushAll(state, false);
    return emit({ ...flushed.state, inList: false }, flushed.blocks);
  }

  /**
   * Consume the line at `index`, plus any continuation lines a list item
   * absorbs.
   */
  step(state: AccumulatorState, lines: readonly string[], index: number): LineStep {
    const line = lines[index].trim();
    const nextIndex = index + 1;

    if (this.noise.has(line)) {
      return { state: { ...state, previousLine: line }, blocks: [], nextIndex };
    }

    if (!line) {
      const flushed = flushAll(state, true);
      const result = emit(
        { ...flushed.state, inList: false, previousLine: null },
        flushed.blocks,
      );
      return { ...result, nextIndex };
    }

    const level = LineClassifier.detectHeadingLevel(line, state.previousLine);
    if (level !== null) {
      const flushed = flushAll(state, true);
      const result = emit(
        { ...flushed.state, inList: false, previousLine: line },
        [
          ...flushed.blocks,
          {
            type: 'heading',
            level,
            text: LineClassifier.stripHeadingMarker(line),
          },
          { type: 'blank' },
        ],
      );
      return { ...result, nextIndex };
    }

    const listKind = LineClassifier.detectListKind(line);
    if (listKind !== null) {
      const flushed = flushAll(state, true);
      const marker =
        listKind === 'bullet' ? LineClassifier.normalizeBulletMarker(line) : line;
      const absorbed = this.absorbListContinuation(lines, nextIndex);
      const result = emit(
        {
          ...flushed.state,
          listItem: [marker, ...absorbed.fragments],
          listKind,
          inList: true,
          previousLine: line,
        },
        flushed.blocks,
      );
      return { ...result, nextIndex: absorbed.nextIndex };
    }

    return { ...this.appendText(state, line), nextIndex };
  }

  /**
   * Greedily collect the lines that continue a list item.
   */
  private absorbListContinuation(
    lines: readonly string[],
    start: number,
  ): { fragments: string[]; nextIndex: number } {
    const fragments: string[] = [];
    let index = start;

    while (index < lines.length) {
      const next = lines[index].trim();

      if (!next) break;

      if (this.noise.has(next)) {
        index++;
        continue;
      }

      if (
        LineClassifier.detectListKind(next) !== null ||
        LineClassifier.detectHeadingLevel(next, lines[index - 1].trim()) !== null
      ) {
        break;
      }

      fragments.push(next);
      index++;

      // A finished sentence ends the item when the line after it starts
      // something new
      if (endsWithAny(next, SENTENCE_END) && index < lines.length) {
        const peek = lines[index].trim();
        if (
          !peek ||
          LineClassifier.detectListKind(peek) !== null ||
          LineClassifier.detectHeadingLevel(peek, next) !== null
        ) {
          break;
        }
      }
    }

    return { fragments, nextIndex: index };
  }

  /**
   * Add a plain text line to the open paragraph, or start a new one.
   */
  private appendText(state: AccumulatorState, line: string): ReflowStep {
    const list = state.inList ? flushList(state) : { state, blocks: [] };
    const base: AccumulatorState = {
      ...list.state,
      inList: false,
      previousLine: line,
    };

    const last = base.paragraph.at(-1);
    if (
      last === undefined ||
      line.endsWith('-') ||
      !endsWithAny(last, PARAGRAPH_END)
    ) {
      return emit(
        { ...base, paragraph: [...base.paragraph, line] },
        list.blocks,
      );
    }

    const paragraph = flushParagraph(base, true);
    return emit({ ...paragraph.state, paragraph: [line] }, [
      ...list.blocks,
      ...paragraph.blocks,
    ]);
  }
}

import type { MarkdownBlock } from '@pagemark/model';

import { describe, expect, test } from 'vitest';

import { MarkdownRenderer } from './markdown-renderer';

describe('MarkdownRenderer', () => {
  describe('renderBlock', () => {
    test('headings get one hash per level', () => {
      expect(
        MarkdownRenderer.renderBlock({ type: 'heading', level: 2, text: 'Scope' }),
      ).toBe('## Scope');
      expect(
        MarkdownRenderer.renderBlock({ type: 'heading', level: 3, text: 'Notes' }),
      ).toBe('### Notes');
    });

    test('blank renders as an empty line', () => {
      expect(MarkdownRenderer.renderBlock({ type: 'blank' })).toBe('');
    });

    test('text blocks render their text', () => {
      expect(
        MarkdownRenderer.renderBlock({
          type: 'list-item',
          kind: 'numbered',
          text: '2) second',
        }),
      ).toBe('2) second');
      expect(
        MarkdownRenderer.renderBlock({ type: 'toc-entry', text: '4 ... Scope' }),
      ).toBe('4 ... Scope');
    });
  });

  describe('finalize', () => {
    test('collapses runs of blank lines to one', () => {
      expect(MarkdownRenderer.finalize('a\n\n\n\n\nb')).toBe('a\n\nb');
    });

    test('keeps a single blank line', () => {
      expect(MarkdownRenderer.finalize('a\n\nb')).toBe('a\n\nb');
    });

    test('removes whitespace before punctuation', () => {
      expect(MarkdownRenderer.finalize('Hello , world ! Done ; ok :')).toBe(
        'Hello, world! Done; ok:',
      );
    });

    test('removes whitespace before a leader in TOC entries', () => {
      expect(MarkdownRenderer.finalize('12 ... Chapter One')).toBe(
        '12... Chapter One',
      );
    });

    test('trims trailing whitespace on every line', () => {
      expect(MarkdownRenderer.finalize('one  \ntwo\t\nthree')).toBe(
        'one\ntwo\nthree',
      );
    });
  });

  describe('render', () => {
    test('renders a block sequence into Markdown', () => {
      const blocks: MarkdownBlock[] = [
        { type: 'heading', level: 2, text: 'OVERVIEW' },
        { type: 'blank' },
        { type: 'paragraph', text: 'First paragraph.' },
        { type: 'blank' },
        { type: 'blank' },
        { type: 'list-item', kind: 'bullet', text: '- item' },
      ];

      expect(MarkdownRenderer.render(blocks)).toBe(
        '## OVERVIEW\n\nFirst paragraph.\n\n- item',
      );
    });

    test('empty block list renders as empty string', () => {
      expect(MarkdownRenderer.render([])).toBe('');
    });
  });
});

import type { LoggerMethods } from '@pagemark/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { DocumentConverter } from './document-converter';
import { ConversionOptionsError } from './errors/conversion-options-error';

describe('DocumentConverter', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  describe('constructor', () => {
    test('rejects out-of-range options', () => {
      expect(
        () => new DocumentConverter({ logger: mockLogger, tocLineRatio: 2 }),
      ).toThrow(ConversionOptionsError);
    });
  });

  describe('convertTexts', () => {
    test('joins a paragraph that continues onto the next page', () => {
      const converter = new DocumentConverter({ logger: mockLogger });

      const result = converter.convertTexts([
        'The study began in',
        'spring of that year.',
      ]);

      expect(result.markdown).toBe('The study began in spring of that year.');
      expect(result.stats).toEqual({
        pageCount: 2,
        lineCount: 1,
        characterCount: 39,
      });
    });

    test('removes running headers and footers from every page', () => {
      const converter = new DocumentConverter({ logger: mockLogger });
      const pages = Array.from(
        { length: 10 },
        (_, i) => `Annual Report\nsection ${i + 1} body text\nConfidential`,
      );

      const result = converter.convertTexts(pages);

      expect([...result.noise].sort()).toEqual(['Annual Report', 'Confidential']);
      expect(result.markdown).toBe(
        Array.from({ length: 10 }, (_, i) => `section ${i + 1} body text`).join(
          ' ',
        ),
      );
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[DocumentConverter] Found 2 header/footer lines',
      );
    });

    test('renders a table of contents page ahead of the body', () => {
      const converter = new DocumentConverter({ logger: mockLogger });

      const result = converter.convertTexts([
        'Contents\nIntroduction.....1\nMethods.....5',
        'INTRODUCTION\nThis is the body.',
      ]);

      expect(result.tocPages).toEqual([0]);
      expect(result.markdown).toBe(
        [
          '',
          '## Table of Contents',
          '',
          'Contents',
          '1... Introduction',
          '5... Methods',
          '',
          '## INTRODUCTION',
          '',
          'This is the body.',
        ].join('\n'),
      );
    });

    test('reflows TOC-like pages past the page limit as content', () => {
      const converter = new DocumentConverter({
        logger: mockLogger,
        tocPageLimit: 1,
      });

      const result = converter.convertTexts([
        'Alpha.....1\nBeta.....2',
        'Gamma.....3\nDelta.....4',
      ]);

      expect(result.tocPages).toEqual([0]);
      expect(result.markdown).toBe(
        [
          '',
          '## Table of Contents',
          '',
          '1... Alpha',
          '2... Beta',
          '',
          'Gamma.....3 Delta.....4',
        ].join('\n'),
      );
    });

    test('checks only the first twenty pages for a table of contents', () => {
      const converter = new DocumentConverter({ logger: mockLogger });
      const filler = Array.from({ length: 20 }, () => 'plain words here');

      expect(
        converter.convertTexts([...filler, 'Alpha.....1\nBeta.....2']).tocPages,
      ).toEqual([]);
      expect(
        converter.convertTexts([
          ...filler.slice(1),
          'Alpha.....1\nBeta.....2',
        ]).tocPages,
      ).toEqual([19]);
    });

    test('normalizes typographic characters to ASCII', () => {
      const converter = new DocumentConverter({ logger: mockLogger });

      const result = converter.convertTexts([
        '\u201Cquoted\u201D text \u2014 here',
      ]);

      expect(result.markdown).toBe('"quoted" text -- here');
    });
  });

  describe('convert', () => {
    test('drops pages without text before classification', () => {
      const converter = new DocumentConverter({
        logger: mockLogger,
        tocPageLimit: 1,
      });

      const result = converter.convert([
        { pageNo: 1, text: '  \n' },
        { pageNo: 2, text: 'Alpha.....1\nBeta.....2' },
      ]);

      expect(result.tocPages).toEqual([0]);
      expect(result.stats.pageCount).toBe(1);
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[DocumentConverter] Skipped empty pages: 1',
      );
    });

    test('returns empty Markdown for a document without text', () => {
      const converter = new DocumentConverter({ logger: mockLogger });

      const result = converter.convert([{ pageNo: 1, text: '' }]);

      expect(result.markdown).toBe('');
      expect(result.blocks).toEqual([]);
      expect(result.stats).toEqual({
        pageCount: 0,
        lineCount: 0,
        characterCount: 0,
      });
    });

    test('never leaves runs of blank lines or trailing spaces', () => {
      const converter = new DocumentConverter({ logger: mockLogger });

      const result = converter.convertTexts([
        'first part ends here.   \n\n\n\nSECOND PART\n\n\n- item one\n\n',
        '\n\nclosing words.',
      ]);

      expect(result.markdown).not.toMatch(/\n{3,}/);
      for (const line of result.markdown.split('\n')) {
        expect(line).toBe(line.trimEnd());
      }
    });
  });
});

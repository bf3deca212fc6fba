import type { ListKind } from '@pagemark/model';

/**
 * Heading levels the classifier can infer
 */
export type DetectedHeadingLevel = 2 | 3;

/**
 * Outcome of a heading rule: a level, a definite rejection, or null to
 * defer to the next rule
 */
export type HeadingVerdict = DetectedHeadingLevel | 'not-heading';

export interface HeadingRule {
  name: string;
  decide: (line: string, previous: string | null) => HeadingVerdict | null;
}

/**
 * Leading glyphs that mark a bullet item
 */
export const BULLET_GLYPHS = ['•', '●', '◦', '▪', '-', '*'] as const;

/**
 * Leading glyphs that rule a line out as a heading
 */
const NON_HEADING_PREFIXES = ['-', '*', '•', '●'] as const;

/**
 * Closing words after which a line is still incomplete
 */
const CONTINUATION_WORDS: ReadonlySet<string> = new Set([
  'and',
  'or',
  'but',
  'the',
  'a',
  'an',
]);

const NUMBERED_ITEM_PATTERN = /^\d+[.)]\s/;
const HEADING_MARKER_PATTERN = /^#{1,3}\s*/;
const BULLET_MARKER_PATTERN = /^[•●◦▪\-*]\s*/;

function words(line: string): string[] {
  return line.split(/\s+/).filter((word) => word.length > 0);
}

function isUppercase(text: string): boolean {
  return text !== text.toLowerCase() && text === text.toUpperCase();
}

function isLowercase(text: string): boolean {
  return text !== text.toUpperCase() && text === text.toLowerCase();
}

function endsWithAny(line: string, endings: readonly string[]): boolean {
  return endings.some((ending) => line.endsWith(ending));
}

/**
 * Heading rules in priority order. The first rule with a verdict wins;
 * a line no rule decides is not a heading.
 */
export const HEADING_RULES: readonly HeadingRule[] = [
  {
    name: 'implausible',
    decide: (line) => {
      if (line.length < 3) return 'not-heading';
      if (NON_HEADING_PREFIXES.some((prefix) => line.startsWith(prefix))) {
        return 'not-heading';
      }
      if (line.length > 80 && endsWithAny(line, ['.', '!', '?'])) {
        return 'not-heading';
      }
      return null;
    },
  },
  {
    name: 'marked',
    decide: (line) => (line.startsWith('###') ? 3 : null),
  },
  {
    name: 'lowercase-continuation',
    decide: (line, previous) =>
      previous && isLowercase(line[0]) ? 'not-heading' : null,
  },
  {
    name: 'incomplete-previous',
    decide: (_line, previous) => {
      if (!previous) return null;
      if (endsWithAny(previous, ['-', ','])) return 'not-heading';
      const lastWord = words(previous).at(-1)?.toLowerCase() ?? '';
      return CONTINUATION_WORDS.has(lastWord) ? 'not-heading' : null;
    },
  },
  {
    name: 'all-caps',
    decide: (line) => {
      if (!isUppercase(line) || line.length <= 3 || line.length >= 60) {
        return null;
      }
      // A lone word counts only when it is a plain word like INTRODUCTION
      return words(line).length >= 2 || /^[A-Z]+$/.test(line) ? 2 : null;
    },
  },
  {
    name: 'title-case',
    decide: (line) => {
      const lineWords = words(line);
      if (lineWords.length < 2 || lineWords.length > 12 || line.length >= 80) {
        return null;
      }
      const capitalized = lineWords.filter((word) =>
        isUppercase(word[0]),
      ).length;
      if (capitalized < lineWords.length * 0.7) return null;
      return endsWithAny(line, ['.', '!', '?', ',']) ? null : 3;
    },
  },
];

/**
 * LineClassifier
 *
 * Stateless heading and list-start detection for a single stripped line.
 */
export class LineClassifier {
  /**
   * Detect whether a line is a heading, and at which level.
   *
   * @param line - Stripped line to classify
   * @param previous - Preceding line on the page, if any
   * @returns 2 or 3, or null when the line is not a heading
   */
  static detectHeadingLevel(
    line: string,
    previous?: string | null,
  ): DetectedHeadingLevel | null {
    const trimmed = line.trim();
    const context = previous ? previous : null;

    for (const rule of HEADING_RULES) {
      const verdict = rule.decide(trimmed, context);
      if (verdict === 'not-heading') return null;
      if (verdict !== null) return verdict;
    }

    return null;
  }

  /**
   * Detect whether a line starts a bullet or numbered list item.
   */
  static detectListKind(line: string): ListKind | null {
    const trimmed = line.trim();
    if (BULLET_GLYPHS.some((glyph) => trimmed.startsWith(glyph))) {
      return 'bullet';
    }
    if (NUMBERED_ITEM_PATTERN.test(trimmed)) {
      return 'numbered';
    }
    return null;
  }

  /**
   * Remove a leading `#`, `##` or `###` marker.
   */
  static stripHeadingMarker(line: string): string {
    return line.replace(HEADING_MARKER_PATTERN, '');
  }

  /**
   * Replace any leading bullet glyph with the canonical `- ` marker.
   */
  static normalizeBulletMarker(line: string): string {
    return line.replace(BULLET_MARKER_PATTERN, '- ');
  }
}

/**
 * One TOC rewrite rule. Returns the rewritten line, or null when the rule
 * does not apply and the next rule should be tried.
 */
export interface TocLineRule {
  name: string;
  apply: (line: string) => string | null;
}

const MAX_PAGE_DIGITS = 4;
const MAX_ROMAN_LENGTH = 5;

function locatorFirst(locator: string, title: string): string {
  return `${locator.trim()} ... ${title.trim()}`;
}

/**
 * Rule for `title <separator> locator`, with an optional cap on locator length
 */
function titleLocatorRule(
  name: string,
  pattern: RegExp,
  maxLocatorLength?: number,
): TocLineRule {
  return {
    name,
    apply: (line) => {
      const match = pattern.exec(line);
      if (!match) {
        return null;
      }
      const [, title, locator] = match;
      if (maxLocatorLength !== undefined && locator.length > maxLocatorLength) {
        return null;
      }
      return locatorFirst(locator, title);
    },
  };
}

/**
 * Rule for a line holding nothing but a locator
 */
function bareLocatorRule(
  name: string,
  pattern: RegExp,
  maxLength: number,
): TocLineRule {
  return {
    name,
    apply: (line) =>
      pattern.test(line) && line.length <= maxLength ? `${line} ...` : null,
  };
}

/**
 * TOC rewrite rules in priority order. The first rule that applies wins.
 */
export const TOC_LINE_RULES: readonly TocLineRule[] = [
  titleLocatorRule('dotted-page', /^(.+?)\.{2,}(\d+)\s*$/),
  titleLocatorRule('dotted-roman', /^(.+?)\.{2,}([ivxlcdm]+)\s*$/i),
  titleLocatorRule('spaced-page', /^(.+?)\s+(\d+)\s*$/, MAX_PAGE_DIGITS),
  titleLocatorRule(
    'spaced-roman',
    /^(.+?)\s+([ivxlcdm]+)\s*$/i,
    MAX_ROMAN_LENGTH,
  ),
  bareLocatorRule('bare-page', /^\d+$/, MAX_PAGE_DIGITS),
  bareLocatorRule('bare-roman', /^[ivxlcdm]+$/i, MAX_ROMAN_LENGTH),
];

/**
 * TocLineFormatter
 *
 * Rewrites a table-of-contents line from `title .... locator` into
 * `locator ... title`, dropping the dot leader. Lines no rule matches are
 * returned trimmed but otherwise unchanged.
 *
 * @example
 * ```typescript
 * TocLineFormatter.format('Chapter One......12'); // '12 ... Chapter One'
 * TocLineFormatter.format('Preface  iii');        // 'iii ... Preface'
 * TocLineFormatter.format('47');                  // '47 ...'
 * ```
 */
export class TocLineFormatter {
  static format(line: string): string {
    const trimmed = line.trim();

    for (const rule of TOC_LINE_RULES) {
      const formatted = rule.apply(trimmed);
      if (formatted !== null) {
        return formatted;
      }
    }

    return trimmed;
  }
}

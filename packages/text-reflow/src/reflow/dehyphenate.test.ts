import { describe, expect, test } from 'vitest';

import { joinWithDehyphenation } from './dehyphenate';

describe('joinWithDehyphenation', () => {
  test('rejoins a hyphenated word without a space', () => {
    expect(joinWithDehyphenation(['hyphen-', 'ated word'])).toBe(
      'hyphenated word',
    );
  });

  test('joins other fragments with exactly one space', () => {
    expect(joinWithDehyphenation(['first line', 'second line'])).toBe(
      'first line second line',
    );
  });

  test('handles consecutive hyphenated fragments', () => {
    expect(joinWithDehyphenation(['extra-', 'ordi-', 'nary case'])).toBe(
      'extraordinary case',
    );
  });

  test('a trailing hyphen on the last fragment is kept', () => {
    expect(joinWithDehyphenation(['ends with', 'dash-'])).toBe(
      'ends with dash-',
    );
  });

  test('empty input joins to an empty string', () => {
    expect(joinWithDehyphenation([])).toBe('');
  });

  test('single fragment is returned unchanged', () => {
    expect(joinWithDehyphenation(['only'])).toBe('only');
  });
});

/**
 * Join line fragments with single spaces, rejoining words that were split
 * by a line-wrap hyphen.
 *
 * @example
 * ```typescript
 * joinWithDehyphenation(['hyphen-', 'ated word']); // 'hyphenated word'
 * ```
 */
export function joinWithDehyphenation(fragments: readonly string[]): string {
  const joined: string[] = [];

  for (const fragment of fragments) {
    const last = joined.length - 1;
    if (last >= 0 && joined[last].endsWith('-')) {
      joined[last] = joined[last].slice(0, -1) + fragment;
    } else {
      joined.push(fragment);
    }
  }

  return joined.join(' ');
}

import type { MarkdownBlock } from '@pagemark/model';

/**
 * MarkdownRenderer
 *
 * Serializes emitted blocks, one line per block, and applies the final
 * whitespace pass.
 */
export class MarkdownRenderer {
  static renderBlock(block: MarkdownBlock): string {
    switch (block.type) {
      case 'heading':
        return `${'#'.repeat(block.level)} ${block.text}`;
      case 'blank':
        return '';
      default:
        return block.text;
    }
  }

  /**
   * Render blocks and clean up the joined text.
   */
  static render(blocks: readonly MarkdownBlock[]): string {
    return this.finalize(
      blocks.map((block) => this.renderBlock(block)).join('\n'),
    );
  }

  /**
   * Final whitespace pass
   * - Three or more consecutive newlines collapse to one blank line
   * - Whitespace before `. , ! ? ; :` is removed
   * - Trailing whitespace is removed from every line
   */
  static finalize(markdown: string): string {
    const collapsed = markdown
      .replace(/\n{3,}/g, '\n\n')
      .replace(/\s+([.,!?;:])/g, '$1');

    return collapsed
      .split('\n')
      .map((line) => line.trimEnd())
      .join('\n');
  }
}

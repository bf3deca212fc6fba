import type { LoggerMethods } from '@pagemark/logger';
import type { SourcePage } from '@pagemark/model';

import { DocumentConverter } from '@pagemark/text-reflow';
import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';

export const USAGE = 'Usage: pagemark [--verbose] <input.pdf> <output.md>';

/**
 * Anything that can turn a PDF path into page texts
 */
export interface PageSource {
  extractPages(pdfPath: string): Promise<SourcePage[]>;
}

export interface CliDependencies {
  logger: LoggerMethods;
  extractor: PageSource;
}

/**
 * Parsed command line
 */
export interface CliArguments {
  inputPath: string;
  outputPath: string;
  verbose: boolean;
}

/**
 * Split argv into flags and the two positional paths.
 * Returns null when a path is missing.
 */
export function parseArguments(argv: readonly string[]): CliArguments | null {
  const verbose = argv.some((arg) => arg === '--verbose' || arg === '-v');
  const positionals = argv.filter((arg) => !arg.startsWith('-'));

  if (positionals.length < 2) {
    return null;
  }

  const [inputPath, outputPath] = positionals;
  return { inputPath, outputPath, verbose };
}

/**
 * Convert one PDF into a Markdown file.
 *
 * @returns Process exit code
 */
export async function runCli(
  argv: readonly string[],
  { logger, extractor }: CliDependencies,
): Promise<number> {
  const args = parseArguments(argv);
  if (args === null) {
    logger.error(USAGE);
    return 1;
  }

  const { inputPath, outputPath } = args;
  if (!existsSync(inputPath)) {
    logger.error(`Error: ${inputPath} not found`);
    return 1;
  }

  try {
    logger.info(`Converting ${inputPath}...`);
    const pages = await extractor.extractPages(inputPath);
    logger.info(`Extracted ${pages.length} pages`);

    const converter = new DocumentConverter({ logger });
    const { markdown, stats } = converter.convert(pages);

    await writeFile(outputPath, markdown, 'utf-8');

    logger.info(`Done: ${outputPath}`);
    logger.info(`Lines: ${stats.lineCount}`);
    logger.info(`Size: ${stats.characterCount} characters`);
    return 0;
  } catch (error) {
    logger.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }
}

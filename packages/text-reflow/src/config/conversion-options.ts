import { z } from 'zod/v4';

import { ConversionOptionsError } from '../errors/conversion-options-error';
import { HEADER_FOOTER, TOC_PAGE, UNICODE_NORMALIZER } from './constants';

/**
 * Zod schema for DocumentConverter tuning options.
 * Every field is optional on input and filled with its default.
 */
export const ConversionOptionsSchema = z.object({
  noiseMinOccurrences: z
    .number()
    .int()
    .min(1)
    .default(HEADER_FOOTER.MIN_OCCURRENCES)
    .describe('Minimum first/last-line occurrences for a header or footer'),
  noiseMaxLength: z
    .number()
    .int()
    .min(1)
    .default(HEADER_FOOTER.MAX_LENGTH)
    .describe('Header and footer lines are shorter than this'),
  tocPageLimit: z
    .number()
    .int()
    .min(0)
    .default(TOC_PAGE.PAGE_LIMIT)
    .describe('Pages with an index below this are checked for TOC layout'),
  tocLineRatio: z
    .number()
    .min(0)
    .max(1)
    .default(TOC_PAGE.LINE_RATIO)
    .describe('Share of TOC-like lines above which a page is a TOC page'),
  normalizeBatchSize: z
    .number()
    .int()
    .min(0)
    .default(UNICODE_NORMALIZER.BATCH_SIZE)
    .describe('Pages normalized per batch, 0 for sequential'),
});

/**
 * Options as accepted from callers
 */
export type ConversionOptionsInput = z.input<typeof ConversionOptionsSchema>;

/**
 * Options with every default applied
 */
export type ConversionOptions = z.output<typeof ConversionOptionsSchema>;

/**
 * Validate options and apply defaults.
 *
 * @throws {ConversionOptionsError} When a value is out of range
 */
export function resolveConversionOptions(
  input: ConversionOptionsInput = {},
): ConversionOptions {
  const result = ConversionOptionsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConversionOptionsError(`Invalid conversion options: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}

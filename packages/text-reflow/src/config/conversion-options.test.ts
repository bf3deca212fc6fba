import { describe, expect, test } from 'vitest';

import { ConversionOptionsError } from '../errors/conversion-options-error';
import { resolveConversionOptions } from './conversion-options';

describe('resolveConversionOptions', () => {
  test('applies defaults when nothing is given', () => {
    expect(resolveConversionOptions()).toEqual({
      noiseMinOccurrences: 10,
      noiseMaxLength: 60,
      tocPageLimit: 20,
      tocLineRatio: 0.3,
      normalizeBatchSize: 10,
    });
  });

  test('keeps given values', () => {
    const options = resolveConversionOptions({
      noiseMinOccurrences: 3,
      tocPageLimit: 0,
    });

    expect(options.noiseMinOccurrences).toBe(3);
    expect(options.tocPageLimit).toBe(0);
    expect(options.noiseMaxLength).toBe(60);
  });

  test('throws ConversionOptionsError naming the invalid field', () => {
    let caught: unknown;
    try {
      resolveConversionOptions({ noiseMinOccurrences: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConversionOptionsError);
    expect(ConversionOptionsError.getErrorMessage(caught)).toMatch(
      /^Invalid conversion options: noiseMinOccurrences: /,
    );
  });

  test('rejects fractional page counts', () => {
    expect(() => resolveConversionOptions({ tocPageLimit: 2.5 })).toThrow(
      ConversionOptionsError,
    );
  });
});

import { describe, expect, test } from 'vitest';

import { ConversionOptionsError } from './conversion-options-error';

describe('ConversionOptionsError', () => {
  test('sets name and keeps the cause', () => {
    const cause = new Error('too small');
    const error = new ConversionOptionsError('Invalid conversion options', {
      cause,
    });

    expect(error.name).toBe('ConversionOptionsError');
    expect(error.cause).toBe(cause);
  });

  test('fromError prefixes context', () => {
    const error = ConversionOptionsError.fromError('Loading options', 'bad');

    expect(error.message).toBe('Loading options: bad');
    expect(error.cause).toBe('bad');
  });
});

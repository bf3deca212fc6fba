import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger } from './index';

describe('Logger', () => {
  test('exposes the provided methods', () => {
    const methods = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const logger = new Logger(methods);

    logger.info('[Test] hello', 1);
    logger.error('[Test] failed');

    expect(methods.info).toHaveBeenCalledWith('[Test] hello', 1);
    expect(methods.error).toHaveBeenCalledWith('[Test] failed');
    expect(methods.debug).not.toHaveBeenCalled();
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('forwards info, warn and error to the console', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger();
    logger.info('a');
    logger.warn('b');
    logger.error('c');

    expect(info).toHaveBeenCalledWith('a');
    expect(warn).toHaveBeenCalledWith('b');
    expect(error).toHaveBeenCalledWith('c');
  });

  test('drops debug output unless verbose', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createConsoleLogger().debug('quiet');
    expect(debug).not.toHaveBeenCalled();

    createConsoleLogger({ verbose: true }).debug('loud');
    expect(debug).toHaveBeenCalledWith('loud');
  });
});

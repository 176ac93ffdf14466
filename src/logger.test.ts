import { describe, test, expect, vi, afterEach } from 'vitest';
import { createLogger } from './logger.ts';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('prints debug messages only when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger(false).debug('> Number of tables: 2');
    createLogger(true).debug('> Processing table: orders');

    expect(log.mock.calls).toEqual([['> Processing table: orders']]);
  });

  test('prints warnings to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger(false).warn('> Unknown type "jsonb"');

    expect(error).toHaveBeenCalledWith('> Unknown type "jsonb"');
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { logDebug, logError } from '../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints debug as a JSON line on stdout', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logDebug('trace', { id: 1 });
    expect(spy).toHaveBeenCalledWith('{"level":"debug","message":"trace","id":1}');
  });

  it('prints error to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logError('oops', { id: 2 });
    expect(spy).toHaveBeenCalledWith('{"level":"error","message":"oops","id":2}');
  });
});

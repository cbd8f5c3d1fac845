import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('config', () => {
  it('defaults to color without debug', () => {
    expect(loadConfig({})).toEqual({ color: true, debug: false });
  });

  it('reads NO_COLOR and PACECALC_DEBUG', () => {
    expect(loadConfig({ NO_COLOR: '1', PACECALC_DEBUG: 'true' })).toEqual({ color: false, debug: true });
    expect(loadConfig({ NO_COLOR: '', PACECALC_DEBUG: '0' })).toEqual({ color: true, debug: false });
  });
});

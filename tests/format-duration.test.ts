import { describe, it, expect } from 'vitest';
import { formatMinutes } from '../src/utils/format-duration.js';
import { parseTime } from '../src/utils/parse.js';

describe('formatMinutes', () => {
  it('formats under an hour as M:SS', () => {
    expect(formatMinutes(45)).toBe('45:00');
    expect(formatMinutes(4.5, false)).toBe('4:30');
  });

  it('formats hours only when asked', () => {
    expect(formatMinutes(90)).toBe('1:30:00');
    expect(formatMinutes(90, false)).toBe('90:00');
    expect(formatMinutes(189.8775, true)).toBe('3:09:53');
  });

  it('rounds to the nearest second without a :60 field', () => {
    expect(formatMinutes(4.99, false)).toBe('4:59');
    expect(formatMinutes(59.9999)).toBe('60:00');
    expect(formatMinutes(119.9999, true)).toBe('2:00:00');
  });

  it('clamps negative and non-finite values to zero', () => {
    expect(formatMinutes(-3)).toBe('0:00');
    expect(formatMinutes(Number.NaN)).toBe('0:00');
  });

  it('parses back within a second', () => {
    const minutes = 83.4567;
    const res = parseTime(formatMinutes(minutes));
    expect(res.ok).toBe(true);
    if (res.ok) expect(Math.abs(res.value - minutes) * 60).toBeLessThanOrEqual(0.5);
  });
});

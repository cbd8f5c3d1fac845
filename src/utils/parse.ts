import type { Result } from '../domain/types.js';
import { fail, invalidDistance, invalidPace, invalidTime, ok } from '../domain/errors.js';
import { DISTANCE_UNITS, presetKm } from '../engine/units.js';

const DECIMAL = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const LETTER_TIME = /^(?:(\d+(?:\.\d+)?)h)?(?:(\d+(?:\.\d+)?)m)?(?:(\d+)s)?$/;

// Plain non-negative decimal; rejects signs, exponents, "Infinity" and blanks.
export function parseDecimal(value: string): number | null {
  const v = value.trim();
  if (!DECIMAL.test(v)) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

export function parseDistance(input: string): Result<number> {
  const d = input.toLowerCase().trim();

  const preset = presetKm(d);
  if (preset !== null) return ok(preset);

  const unit = DISTANCE_UNITS.find((u) => d.endsWith(u.token));
  if (unit) {
    const value = parseDecimal(d.slice(0, -unit.token.length));
    return value === null ? fail(invalidDistance(input.trim())) : ok(value * unit.km);
  }

  const km = parseDecimal(d);
  return km === null ? fail(invalidDistance(input.trim())) : ok(km);
}

function parseColonTime(time: string): number | null {
  const parts = time.split(':').map(parseDecimal);
  if (parts.some((p) => p === null)) return null;
  const [a, b, c] = parts.map(Number);
  if (parts.length === 2) return a + b / 60;
  if (parts.length === 3) return a * 60 + b + c / 60;
  return null;
}

export function parseTime(input: string): Result<number> {
  const t = input.trim().toLowerCase();

  // 1h30m20s, 90m, 45m30s
  if (/[hms]/.test(t)) {
    const m = t.match(LETTER_TIME);
    if (!m) return fail(invalidTime(input.trim()));
    const hours = Number(m[1] ?? 0);
    const minutes = Number(m[2] ?? 0);
    const seconds = Number(m[3] ?? 0);
    return ok(hours * 60 + minutes + seconds / 60);
  }

  // 45:00, 1:30:45
  if (t.includes(':')) {
    const minutes = parseColonTime(t);
    return minutes === null ? fail(invalidTime(input.trim())) : ok(minutes);
  }

  const minutes = parseDecimal(t);
  return minutes === null ? fail(invalidTime(input.trim())) : ok(minutes);
}

export function parsePace(input: string): Result<number> {
  const p = input.trim();

  // 4:30 per km
  const parts = p.split(':');
  if (parts.length === 2) {
    const minutes = parseDecimal(parts[0]);
    const seconds = parseDecimal(parts[1]);
    if (minutes === null || seconds === null) return fail(invalidPace(p));
    return ok(minutes + seconds / 60);
  }

  const value = parseDecimal(p);
  return value === null ? fail(invalidPace(p)) : ok(value);
}

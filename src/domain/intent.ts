import type { DerivationInput, Preposition } from './types.js';
import { presetKm } from '../engine/units.js';

/**
 * Best-effort guess at whether a token is a time rather than a distance or
 * pace. Not a parser: bare numbers are never treated as times.
 */
export function looksLikeTime(value: string): boolean {
  const v = value.trim().toLowerCase();

  // Presets like "marathon" or "400m" carry letters but are distances
  if (presetKm(v) !== null) return false;

  if (/[hms:]/.test(v)) return true;

  return false;
}

// "10km in 45:00" → distance + time; "marathon at 4:30" → distance + pace;
// "1:30:00 at 5:00" → time + pace.
export function resolveRoles(first: string, preposition: Preposition, second: string): DerivationInput {
  if (preposition === 'in') return { distance: first, time: second };
  if (looksLikeTime(first)) return { time: first, pace: second };
  return { distance: first, pace: second };
}

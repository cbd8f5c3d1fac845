export const MARATHON_KM = 42.195;
export const HALF_MARATHON_KM = 21.0975;
export const MILE_KM = 1.609344;

// Exact tokens, matched before any suffix unit.
export const DISTANCE_PRESETS: Readonly<Record<string, number>> = Object.freeze({
  'marathon': MARATHON_KM,
  'm': MARATHON_KM,
  'half-marathon': HALF_MARATHON_KM,
  'half': HALF_MARATHON_KM,
  'hm': HALF_MARATHON_KM,
  '10k': 10,
  '5k': 5,
  '1k': 1,
  '400m': 0.4,
  '800m': 0.8,
  '1mi': MILE_KM
});

export interface DistanceUnit {
  token: string;
  km: number;
}

// Longest token first: "km" and "hm" must win over "m", "half-marathon" over "marathon".
// A bare "m" counts marathons, so "2m" is 84.39 km.
export const DISTANCE_UNITS: readonly DistanceUnit[] = Object.freeze(
  [
    { token: 'half-marathon', km: HALF_MARATHON_KM },
    { token: 'marathon', km: MARATHON_KM },
    { token: 'miles', km: MILE_KM },
    { token: 'mile', km: MILE_KM },
    { token: 'hm', km: HALF_MARATHON_KM },
    { token: 'km', km: 1 },
    { token: 'mi', km: MILE_KM },
    { token: 'k', km: 1 },
    { token: 'm', km: MARATHON_KM }
  ].sort((a, b) => b.token.length - a.token.length)
);

export function presetKm(token: string): number | null {
  return Object.hasOwn(DISTANCE_PRESETS, token) ? DISTANCE_PRESETS[token] : null;
}

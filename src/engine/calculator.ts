import type { Checkpoint, DerivationInput, Result, RunningMetrics } from '../domain/types.js';
import { divisionByZero, fail, invalidArguments, ok } from '../domain/errors.js';
import { parseDistance, parsePace, parseTime } from '../utils/parse.js';
import { formatMinutes } from '../utils/format-duration.js';
import { paceToSpeedKmh, timeAtPace } from '../utils/pace.js';
import { HALF_MARATHON_KM, MARATHON_KM } from './units.js';
import { calculateTrainingZones } from './zones.js';

export const SPLIT_DISTANCES_KM = [1, 5, 10, HALF_MARATHON_KM, MARATHON_KM] as const;
export const PROJECTION_DISTANCES_KM = [5, 10, HALF_MARATHON_KM, MARATHON_KM] as const;

interface Core {
  distance_km: number;
  time_minutes: number;
  pace_min_per_km: number;
}

const given = (v: string | null | undefined): v is string => typeof v === 'string' && v.trim() !== '';

function checkpoint(distanceKm: number, paceMinPerKm: number): Checkpoint {
  return {
    label: `${distanceKm}km`,
    distance_km: distanceKm,
    time: formatMinutes(timeAtPace(distanceKm, paceMinPerKm), distanceKm >= 10)
  };
}

export function calculateSplits(paceMinPerKm: number): Checkpoint[] {
  return SPLIT_DISTANCES_KM.map((d) => checkpoint(d, paceMinPerKm));
}

// Exact comparison: the entered distance is usually one of these literals.
export function calculateProjections(distanceKm: number, paceMinPerKm: number): Checkpoint[] {
  return PROJECTION_DISTANCES_KM
    .filter((d) => d !== distanceKm)
    .map((d) => checkpoint(d, paceMinPerKm));
}

function solve(input: DerivationInput): Result<Core> {
  const supplied = [input.distance, input.time, input.pace].filter(given).length;
  if (supplied !== 2) return fail(invalidArguments(supplied));

  const distance = given(input.distance) ? parseDistance(input.distance) : null;
  const time = given(input.time) ? parseTime(input.time) : null;
  const pace = given(input.pace) ? parsePace(input.pace) : null;

  for (const parsed of [distance, time, pace]) {
    if (parsed && !parsed.ok) return parsed;
  }

  if (distance?.ok && time?.ok) {
    if (distance.value === 0) return fail(divisionByZero('distance'));
    return ok({ distance_km: distance.value, time_minutes: time.value, pace_min_per_km: time.value / distance.value });
  }
  if (distance?.ok && pace?.ok) {
    return ok({ distance_km: distance.value, time_minutes: timeAtPace(distance.value, pace.value), pace_min_per_km: pace.value });
  }
  if (time?.ok && pace?.ok) {
    if (pace.value === 0) return fail(divisionByZero('pace'));
    return ok({ distance_km: time.value / pace.value, time_minutes: time.value, pace_min_per_km: pace.value });
  }
  return fail(invalidArguments(supplied));
}

/**
 * Derives the missing one of distance, time and pace from the two given
 * strings, plus splits, projections and training zones at the resulting pace.
 */
export function derive(input: DerivationInput): Result<RunningMetrics> {
  const core = solve(input);
  if (!core.ok) return core;

  const { distance_km, time_minutes, pace_min_per_km } = core.value;
  return ok(Object.freeze({
    distance_km,
    time_minutes,
    pace_min_per_km,
    speed_kmh: paceToSpeedKmh(pace_min_per_km),
    splits: Object.freeze(calculateSplits(pace_min_per_km)),
    projected_times: Object.freeze(calculateProjections(distance_km, pace_min_per_km)),
    training_zones: Object.freeze(calculateTrainingZones(pace_min_per_km))
  }));
}

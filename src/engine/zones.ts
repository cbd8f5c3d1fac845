import type { ZoneRange } from '../domain/types.js';
import { formatMinutes } from '../utils/format-duration.js';

export interface TrainingZone {
  name: string;
  min_multiplier: number;
  max_multiplier: number;
}

// Multipliers of threshold pace (the current pace); larger means slower.
export const TRAINING_ZONES: readonly TrainingZone[] = Object.freeze([
  { name: 'Easy', min_multiplier: 1.15, max_multiplier: 1.25 },
  { name: 'Threshold', min_multiplier: 1.05, max_multiplier: 1.15 },
  { name: 'Tempo', min_multiplier: 1.0, max_multiplier: 1.05 },
  { name: 'VO2 Max', min_multiplier: 0.9, max_multiplier: 1.0 },
  { name: 'Speed', min_multiplier: 0.8, max_multiplier: 0.9 }
]);

export function calculateTrainingZones(thresholdPace: number): ZoneRange[] {
  return TRAINING_ZONES.map((zone) => ({
    name: zone.name,
    range: `${formatMinutes(thresholdPace * zone.min_multiplier, false)} - ${formatMinutes(thresholdPace * zone.max_multiplier, false)}`
  }));
}

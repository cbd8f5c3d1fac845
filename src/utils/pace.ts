import { formatMinutes } from './format-duration.js';

export function formatPace(minPerKm: number): string {
  return `${formatMinutes(minPerKm, false)} min/km`;
}

export function paceToSpeedKmh(minPerKm: number): number {
  return minPerKm > 0 ? 60 / minPerKm : 0;
}

export function timeAtPace(distanceKm: number, minPerKm: number): number {
  return distanceKm * minPerKm;
}

import type { Insights, PerformanceInsight, PerformanceTier, RunningMetrics } from '../domain/types.js';
import { formatMinutes } from '../utils/format-duration.js';
import { timeAtPace } from '../utils/pace.js';
import { MARATHON_KM } from './units.js';

const TIER_MESSAGES: Record<PerformanceTier, string> = {
  elite: "Elite level performance! You're in the top tier of runners.",
  excellent: "Excellent performance! You're a very strong runner.",
  good: "Good performance! You're above average.",
  solid: 'Solid performance! Focus on consistency and gradual improvement.',
  building: 'Building foundation! Every run makes you stronger.'
};

export function classifyPerformance(paceMinPerKm: number): PerformanceInsight {
  let tier: PerformanceTier;
  if (paceMinPerKm <= 3) {
    // 3:00/km or faster
    tier = 'elite';
  } else if (paceMinPerKm <= 4) {
    tier = 'excellent';
  } else if (paceMinPerKm <= 5) {
    tier = 'good';
  } else if (paceMinPerKm <= 6) {
    tier = 'solid';
  } else {
    tier = 'building';
  }
  return { tier, message: TIER_MESSAGES[tier] };
}

// Only meaningful for runs shorter than a marathon.
export function projectMarathon(paceMinPerKm: number, currentDistanceKm: number): string | null {
  if (currentDistanceKm >= MARATHON_KM) return null;
  return formatMinutes(timeAtPace(MARATHON_KM, paceMinPerKm), true);
}

export function buildInsights(metrics: RunningMetrics): Insights {
  return {
    performance: classifyPerformance(metrics.pace_min_per_km),
    marathon_projection: projectMarathon(metrics.pace_min_per_km, metrics.distance_km)
  };
}

import type { Checkpoint, Insights, RunningMetrics } from './domain/types.js';
import { formatMinutes } from './utils/format-duration.js';
import { formatPace } from './utils/pace.js';

export interface Palette {
  title: string;
  success: string;
  info: string;
  warning: string;
  error: string;
  highlight: string;
  reset: string;
}

export const ANSI_PALETTE: Palette = {
  title: '\x1b[96m\x1b[1m',
  success: '\x1b[32m\x1b[1m',
  info: '\x1b[34m',
  warning: '\x1b[33m',
  error: '\x1b[31m\x1b[1m',
  highlight: '\x1b[35m\x1b[1m',
  reset: '\x1b[0m'
};

export const PLAIN_PALETTE: Palette = {
  title: '',
  success: '',
  info: '',
  warning: '',
  error: '',
  highlight: '',
  reset: ''
};

export const paletteFor = (color: boolean): Palette => (color ? ANSI_PALETTE : PLAIN_PALETTE);

const RULE = '='.repeat(50);

export function renderBanner(c: Palette): string {
  return [
    `${c.title}+${'='.repeat(63)}+`,
    `|${'PACE CALCULATOR'.padStart(39).padEnd(63)}|`,
    `+${'='.repeat(63)}+${c.reset}`
  ].join('\n');
}

function renderCheckpoints(rows: readonly Checkpoint[], c: Palette): string[] {
  return rows.map((row) => `  ${row.label.padStart(6)}: ${c.info}${row.time}${c.reset}`);
}

export function renderInsights(insights: Insights, c: Palette): string[] {
  const { tier, message } = insights.performance;
  const tone = tier === 'elite' || tier === 'excellent' ? c.success : tier === 'solid' ? c.warning : c.info;
  const lines = [`  ${tone}${message}${c.reset}`];
  if (insights.marathon_projection) {
    lines.push(`  ${c.highlight}At this pace, you'd complete a marathon in: ${insights.marathon_projection}${c.reset}`);
  }
  return lines;
}

export function renderReport(metrics: RunningMetrics, insights: Insights, c: Palette): string {
  const lines: string[] = [
    '',
    `${c.success}CALCULATION RESULTS${c.reset}`,
    RULE,
    '',
    `${c.highlight}MAIN METRICS:${c.reset}`,
    `  Distance: ${c.info}${metrics.distance_km.toFixed(3)} km${c.reset}`,
    `  Time:     ${c.info}${formatMinutes(metrics.time_minutes, true)}${c.reset}`,
    `  Pace:     ${c.info}${formatPace(metrics.pace_min_per_km)}${c.reset}`,
    `  Speed:    ${c.info}${metrics.speed_kmh.toFixed(1)} km/h${c.reset}`,
    '',
    `${c.highlight}SPLITS:${c.reset}`,
    ...renderCheckpoints(metrics.splits, c)
  ];

  if (metrics.projected_times.length) {
    lines.push('', `${c.highlight}PROJECTED TIMES:${c.reset}`, ...renderCheckpoints(metrics.projected_times, c));
  }

  lines.push('', `${c.highlight}TRAINING ZONES (based on current pace):${c.reset}`);
  for (const zone of metrics.training_zones) {
    lines.push(`  ${zone.name.padStart(10)}: ${c.info}${zone.range} min/km${c.reset}`);
  }

  lines.push('', `${c.highlight}PERFORMANCE INSIGHTS:${c.reset}`, ...renderInsights(insights, c), '', RULE);
  return lines.join('\n');
}

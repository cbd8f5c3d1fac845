export type Preposition = 'in' | 'at';

export type Quantity = 'distance' | 'time' | 'pace';

export type PerformanceTier = 'elite' | 'excellent' | 'good' | 'solid' | 'building';

export type CalcError =
  | { kind: 'InvalidDistance'; input: string; message: string }
  | { kind: 'InvalidTime'; input: string; message: string }
  | { kind: 'InvalidPace'; input: string; message: string }
  | { kind: 'InvalidArguments'; supplied: number; message: string }
  | { kind: 'DivisionByZero'; quantity: 'distance' | 'pace'; message: string };

export type Result<T, E = CalcError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface DerivationInput {
  distance?: string | null;
  time?: string | null;
  pace?: string | null;
}

export interface Checkpoint {
  label: string;
  distance_km: number;
  time: string;
}

export interface ZoneRange {
  name: string;
  range: string;
}

export interface RunningMetrics {
  readonly distance_km: number;
  readonly time_minutes: number;
  readonly pace_min_per_km: number;
  readonly speed_kmh: number;
  readonly splits: readonly Checkpoint[];
  readonly projected_times: readonly Checkpoint[];
  readonly training_zones: readonly ZoneRange[];
}

export interface PerformanceInsight {
  tier: PerformanceTier;
  message: string;
}

export interface Insights {
  performance: PerformanceInsight;
  marathon_projection: string | null;
}

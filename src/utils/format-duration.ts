const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Renders a minute count as `M:SS`, or `H:MM:SS` when `useHours` is set and
 * the value reaches an hour. Rounds to the nearest second before splitting,
 * so no field ever reads 60.
 */
export function formatMinutes(value: number, useHours = true): string {
  const minutes = Number.isFinite(value) ? Math.max(0, value) : 0;
  const total = Math.round(minutes * 60);
  const ss = total % 60;

  if (minutes < 60 || !useHours) {
    return `${Math.floor(total / 60)}:${pad(ss)}`;
  }

  const hh = Math.floor(total / 3600);
  const mm = Math.floor((total % 3600) / 60);
  return `${hh}:${pad(mm)}:${pad(ss)}`;
}

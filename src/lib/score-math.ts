/** Numeric helpers shared by the gates and scorers. */

/** Clamp to [0, 1]; non-finite input collapses to 0. Idempotent. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/** A measured lab value, or null when absent or non-finite (NaN reads as "not measured"). */
export function measuredValue(value: number | null | undefined): number | null {
  return value != null && Number.isFinite(value) ? value : null;
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/** Round half away from zero to 3 decimals, the reporting precision for all scores. */
export function round3(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value) * 1000) / 1000;
}

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function l2Norm(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v * v;
  return Math.sqrt(sum);
}

/** L2-normalize; the zero vector stays zero. */
export function l2Normalize(values: readonly number[]): number[] {
  const magnitude = l2Norm(values);
  if (magnitude === 0) return values.map(() => 0);
  return values.map((v) => v / magnitude);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Sort descending by a numeric key. Array.prototype.sort is stable, so ties
 * keep input order.
 */
export function sortByDescending<T>(items: readonly T[], key: (item: T) => number): T[] {
  return [...items].sort((a, b) => key(b) - key(a));
}

export function formatPct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

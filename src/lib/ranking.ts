import type { Metric } from "@/lib/efficiency";

/**
 * Clamp a requested selection size into [1, total]. Non-finite input counts as 1;
 * an empty collection always selects nothing.
 */
export function clampRankSize(n: number, total: number): number {
  if (total <= 0) return 0;
  const whole = Number.isFinite(n) ? Math.floor(n) : 1;
  return Math.min(Math.max(whole, 1), total);
}

/**
 * Descending order on a metric. Undefined metrics go last; ties fall back to
 * `tieBreak` (ascending entity key) so the order is total and stable.
 */
export function byMetricDesc<T>(
  metric: (item: T) => Metric,
  tieBreak: (a: T, b: T) => number,
): (a: T, b: T) => number {
  return (a, b) => {
    const ma = metric(a);
    const mb = metric(b);
    if (ma === null && mb === null) return tieBreak(a, b);
    if (ma === null) return 1;
    if (mb === null) return -1;
    if (ma !== mb) return mb - ma;
    return tieBreak(a, b);
  };
}

export function rankDescending<T>(
  items: readonly T[],
  metric: (item: T) => Metric,
  tieBreak: (a: T, b: T) => number,
): T[] {
  return [...items].sort(byMetricDesc(metric, tieBreak));
}

/** First n of a collection already sorted descending by its metric. */
export function topN<T>(sortedByMetricDesc: readonly T[], n: number): T[] {
  return sortedByMetricDesc.slice(0, clampRankSize(n, sortedByMetricDesc.length));
}

/**
 * Last n of the same descending order, returned lowest first (the first n of
 * the ascending order).
 */
export function bottomN<T>(sortedByMetricDesc: readonly T[], n: number): T[] {
  const size = clampRankSize(n, sortedByMetricDesc.length);
  if (size === 0) return [];
  return sortedByMetricDesc.slice(-size).reverse();
}

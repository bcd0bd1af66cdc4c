/**
 * Efficiency is the actual counter as a percentage of the rated ("100%
 * efficiency") counter. Two formulas exist and are not interchangeable:
 *
 * - per-record: each record's own ratio, averaged across a group when ranking
 *   machines by "average efficiency";
 * - aggregate: summed actual over summed rated for a group, which weights each
 *   record by its rated counter. Used by the machine summary and operators.
 *
 * A zero rated counter (or rated sum) gives UNDEFINED_METRIC. Values above 100
 * are kept as they are.
 */

export const UNDEFINED_METRIC = null;

export type UndefinedMetric = typeof UNDEFINED_METRIC;

export type Metric = number | UndefinedMetric;

export interface CounterReading {
  actualCounter: number;
  ratedCounter: number;
}

export function isDefinedMetric(value: Metric): value is number {
  return value !== UNDEFINED_METRIC && Number.isFinite(value);
}

function ratioPct(actual: number, rated: number): Metric {
  if (rated === 0) return UNDEFINED_METRIC;
  return (actual / rated) * 100;
}

export function perRecordEfficiency(record: CounterReading): Metric {
  return ratioPct(record.actualCounter, record.ratedCounter);
}

export function aggregateEfficiency(totalActual: number, totalRated: number): Metric {
  return ratioPct(totalActual, totalRated);
}

/** Aggregate formula applied directly to a group of readings. */
export function aggregateEfficiencyOf(readings: readonly CounterReading[]): Metric {
  let actual = 0;
  let rated = 0;
  for (const r of readings) {
    actual += r.actualCounter;
    rated += r.ratedCounter;
  }
  return aggregateEfficiency(actual, rated);
}

/** Mean of per-record efficiencies, skipping records whose ratio is undefined. */
export function averageRecordEfficiency(readings: readonly CounterReading[]): Metric {
  const values = readings.map(perRecordEfficiency).filter(isDefinedMetric);
  if (values.length === 0) return UNDEFINED_METRIC;
  return values.reduce((total, v) => total + v, 0) / values.length;
}

export function roundMetric(value: Metric, decimals: number): Metric {
  if (value === UNDEFINED_METRIC) return UNDEFINED_METRIC;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

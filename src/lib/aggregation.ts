export type GroupKey = string | number;

export type Reducer<T, R> = (items: readonly T[]) => R;

export type ReducerMap<T> = Record<string, Reducer<T, unknown>>;

type ReducerResult<R> = R extends (items: never) => infer U ? U : never;

export type Aggregates<M> = { [K in keyof M]: ReducerResult<M[K]> };

export type GroupRow<K extends GroupKey, M> = { key: K; size: number } & Aggregates<M>;

/**
 * Group records by key and reduce each group with every reducer in `reducers`.
 * Groups keep the order in which their first record was seen; sorting is the
 * caller's job.
 */
export function groupBy<T, K extends GroupKey, M extends ReducerMap<T>>(
  records: readonly T[],
  keyFn: (record: T) => K,
  reducers: M,
): Map<K, GroupRow<K, M>> {
  const buckets = new Map<K, T[]>();
  for (const record of records) {
    const key = keyFn(record);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      buckets.set(key, [record]);
    }
  }

  const result = new Map<K, GroupRow<K, M>>();
  for (const [key, items] of buckets) {
    const aggregates: Record<string, unknown> = {};
    for (const [name, reducer] of Object.entries(reducers)) {
      aggregates[name] = reducer(items);
    }
    result.set(key, { ...(aggregates as Aggregates<M>), key, size: items.length });
  }
  return result;
}

// ============================================
// REDUCERS
// ============================================

export function sum<T>(selector: (item: T) => number): Reducer<T, number> {
  return (items) => items.reduce((total, item) => total + selector(item), 0);
}

/** Arithmetic mean; 0 for an empty group. */
export function mean<T>(selector: (item: T) => number): Reducer<T, number> {
  return (items) => (items.length === 0 ? 0 : sum(selector)(items) / items.length);
}

export function count<T>(): Reducer<T, number> {
  return (items) => items.length;
}

/** Distinct values in ascending order by `compare`. */
export function uniqueSorted<T, V>(selector: (item: T) => V, compare: (a: V, b: V) => number): Reducer<T, V[]> {
  return (items) => Array.from(new Set(items.map(selector))).sort(compare);
}

/** Mean of a plain list of numbers, 0 when empty. */
export function average(values: readonly number[]): number {
  return mean<number>((v) => v)(values);
}

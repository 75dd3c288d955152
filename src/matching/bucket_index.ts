// src/matching/bucket_index.ts

/** Coarse key -> candidates, built once and only read afterwards. Buckets keep input order. */
export class BucketIndex<T> {
  private readonly buckets: ReadonlyMap<string, readonly T[]>;

  private constructor(buckets: Map<string, T[]>) {
    this.buckets = buckets;
  }

  static build<T>(items: readonly T[], keyOf: (item: T) => string | null): BucketIndex<T> {
    const buckets = new Map<string, T[]>();
    for (const item of items) {
      const key = keyOf(item);
      if (key === null) continue;
      const bucket = buckets.get(key);
      if (bucket) bucket.push(item);
      else buckets.set(key, [item]);
    }
    return new BucketIndex(buckets);
  }

  get size(): number {
    return this.buckets.size;
  }

  get(key: string | null): readonly T[] {
    if (key === null) return [];
    return this.buckets.get(key) ?? [];
  }

  /** Union of several buckets, each item once, in the order the keys are given. */
  lookup(keys: ReadonlyArray<string | null>): T[] {
    const seen = new Set<T>();
    const out: T[] = [];
    for (const key of keys) {
      for (const item of this.get(key)) {
        if (seen.has(item)) continue;
        seen.add(item);
        out.push(item);
      }
    }
    return out;
  }
}

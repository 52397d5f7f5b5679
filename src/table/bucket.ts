/***
 * Bucket — insertion-ordered entries behind one table slot.
 *
 * Buckets stay plain arrays scanned linearly. The split threshold keeps
 * them short, and their lengths are what that threshold is measured
 * against, so no secondary index sits on top.
 *
 ***/

export interface Entry<V> {
  readonly key: string;
  value: V;
}

export type Bucket<V> = Entry<V>[];

export const NOT_FOUND = -1;

/** Position of `key` in the bucket, or NOT_FOUND. */
export function bucket_find<V>(bucket: Bucket<V>, key: string): number {
  for (let i = 0; i < bucket.length; i++) {
    if (bucket[i].key === key) return i;
  }
  return NOT_FOUND;
}

/** Remove and return the entry at `index`, keeping the rest in order. */
export function bucket_remove_at<V>(bucket: Bucket<V>, index: number): Entry<V> {
  const [removed] = bucket.splice(index, 1);
  return removed;
}

/**
 * Detach every entry from the bucket, leaving it empty.
 * The returned array is owned by the caller.
 */
export function bucket_take<V>(bucket: Bucket<V>): Entry<V>[] {
  return bucket.splice(0, bucket.length);
}

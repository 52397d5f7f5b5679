/***
 *
 * LinearHashTable — string-keyed map that grows one bucket at a time
 *
 * The bucket array starts at a power of two (32 by default) and never
 * doubles. Whenever an insertion leaves a bucket longer than 2^bits, exactly
 * one bucket is split: the one under the split pointer, which walks the
 * table in index order and is usually not the bucket that overflowed.
 * Its entries are detached, one empty bucket is appended, and the detached
 * entries are re-inserted; under the wider address each lands either back
 * in its old bucket or in the new one (see address.ts for folding).
 *
 * State kept consistent across splits:
 *   2^(bits-1) < N <= 2^bits
 *   0 <= split_pointer < 2^(bits-1)
 *   the next bucket appended has index split_pointer + 2^(bits-1)
 *
 * When N reaches 2^bits a round is complete; the next split opens a new
 * round by widening `bits` before it appends, so that bucket 0 is split
 * once per round and every folded address stays where lookups look for it.
 *
 * Lookup, upsert and remove scan one bucket linearly. Splits run
 * synchronously inside upsert. Removal never shrinks the table.
 *
 ***/

import { bucket_address, bit_string, hash_key } from "./address";
import {
  bucket_find,
  bucket_remove_at,
  bucket_take,
  NOT_FOUND,
  type Bucket,
  type Entry,
} from "./bucket";
import { is_power_of_two } from "type_primitives";
import {
  DEFAULT_BUCKET_COUNT,
  MAX_BITS,
  MAX_INITIAL_BITS,
  MIN_BUCKET_COUNT,
} from "utils/constants";
import { HASH_TABLE_ERROR, HashTableError } from "utils/error";
import { get_logger, type Logger } from "utils/logger";

export interface LinearHashTableOptions {
  /** Power of two between 2 and 2^30. Defaults to 32. */
  initial_bucket_count?: number;
  /**
   * When false the table keeps its initial bucket count forever and
   * behaves as a fixed-size chained hash table.
   */
  split_on_overflow?: boolean;
  logger?: Logger;
}

export interface TableStats {
  bucket_count: number;
  entry_count: number;
  bits: number;
  split_pointer: number;
  max_bucket_length: number;
}

export class LinearHashTable<V> {
  private _buckets: Bucket<V>[] = [];
  private _bits: number;
  private _split_pointer = 0;
  private _size = 0;
  private readonly _split_on_overflow: boolean;
  private readonly _logger: Logger;

  constructor(options: LinearHashTableOptions = {}) {
    const initial = options.initial_bucket_count ?? DEFAULT_BUCKET_COUNT;
    if (
      !is_power_of_two(initial) ||
      initial < MIN_BUCKET_COUNT ||
      initial > 2 ** MAX_INITIAL_BITS
    ) {
      throw new HashTableError(
        HASH_TABLE_ERROR.INVALID_BUCKET_COUNT,
        `initial_bucket_count must be a power of two between ${MIN_BUCKET_COUNT} and 2^${MAX_INITIAL_BITS}, got ${initial}`,
        { initial_bucket_count: initial },
      );
    }

    for (let i = 0; i < initial; i++) this._buckets.push([]);
    this._bits = 31 - Math.clz32(initial);
    this._split_on_overflow = options.split_on_overflow ?? true;
    this._logger = options.logger ?? get_logger();
  }

  /** Bucket count. */
  len(): number {
    return this._buckets.length;
  }

  /** Entry count. */
  get size(): number {
    return this._size;
  }

  /**
   * Value stored under `key`, or undefined. Use `has` to tell a stored
   * `undefined` apart from an absent key.
   */
  lookup(key: string): V | undefined {
    const bucket = this._bucket_for(key);
    const i = bucket_find(bucket, key);
    return i === NOT_FOUND ? undefined : bucket[i].value;
  }

  has(key: string): boolean {
    return bucket_find(this._bucket_for(key), key) !== NOT_FOUND;
  }

  /**
   * Insert or overwrite. Returns true when the key was new, false when an
   * existing value was replaced. Only a new key can trigger a split.
   */
  upsert(key: string, value: V): boolean {
    const bucket = this._bucket_for(key);
    const i = bucket_find(bucket, key);
    if (i !== NOT_FOUND) {
      bucket[i].value = value;
      return false;
    }
    this._size++;
    this._insert({ key, value }, bucket);
    return true;
  }

  /** Remove `key` and return its value, or undefined if it was absent. */
  remove(key: string): V | undefined {
    const bucket = this._bucket_for(key);
    const i = bucket_find(bucket, key);
    if (i === NOT_FOUND) return undefined;
    this._size--;
    return bucket_remove_at(bucket, i).value;
  }

  /** Drop every entry. Bucket count and addressing state are kept. */
  clear(): void {
    for (let i = 0; i < this._buckets.length; i++) {
      this._buckets[i].length = 0;
    }
    this._size = 0;
  }

  for_each(fn: (key: string, value: V) => void): void {
    for (let b = 0; b < this._buckets.length; b++) {
      const bucket = this._buckets[b];
      for (let i = 0; i < bucket.length; i++) {
        fn(bucket[i].key, bucket[i].value);
      }
    }
  }

  *[Symbol.iterator](): IterableIterator<[string, V]> {
    for (const bucket of this._buckets) {
      for (const entry of bucket) yield [entry.key, entry.value];
    }
  }

  /** Snapshot of the addressing state. */
  stats(): TableStats {
    let max_bucket_length = 0;
    for (const bucket of this._buckets) {
      if (bucket.length > max_bucket_length) max_bucket_length = bucket.length;
    }
    return {
      bucket_count: this._buckets.length,
      entry_count: this._size,
      bits: this._bits,
      split_pointer: this._split_pointer,
      max_bucket_length,
    };
  }

  //=========================================================
  // Internal
  //=========================================================

  private _bucket_for(key: string): Bucket<V> {
    return this._buckets[
      bucket_address(hash_key(key), this._bits, this._buckets.length)
    ];
  }

  /** Append an entry whose key is known to be absent, splitting on overflow. */
  private _insert(
    entry: Entry<V>,
    bucket: Bucket<V> = this._bucket_for(entry.key),
  ): void {
    bucket.push(entry);
    if (this._split_on_overflow && bucket.length > 2 ** this._bits) {
      this._split();
    }
  }

  private _split(): void {
    if (this._buckets.length === 2 ** this._bits) {
      if (this._bits >= MAX_BITS) {
        throw new HashTableError(
          HASH_TABLE_ERROR.CAPACITY_EXHAUSTED,
          `address width cannot grow past ${MAX_BITS} bits`,
          { bucket_count: this._buckets.length, bits: this._bits },
        );
      }
      this._bits++;
    }

    const half = 2 ** (this._bits - 1);
    const source = this._split_pointer;
    const moved = bucket_take(this._buckets[source]);
    this._buckets.push([]);

    this._split_pointer++;
    if (this._split_pointer === half) this._split_pointer = 0;

    this._logger.debug(
      {
        source,
        target: source + half,
        bits: this._bits,
        mask: bit_string(2 * half - 1),
        moved: moved.length,
        bucket_count: this._buckets.length,
      },
      "bucket split",
    );

    for (let i = 0; i < moved.length; i++) this._insert(moved[i]);
  }
}

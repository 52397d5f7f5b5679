/***
 *
 * Address — string hashing and two-level bucket addressing
 *
 * Keys hash as a rolling polynomial over their UTF-8 bytes:
 *   h = h * 31 + byte        (32-bit unsigned, wraps on overflow)
 *
 * The low `bits` bits of the hash pick a candidate bucket. Because the
 * bucket count N sits strictly between 2^(bits-1) and 2^bits, a candidate
 * can point past the end of the table; such an address belongs to a bucket
 * that has not been split off yet, so its top bit is cleared ("folded")
 * and it resolves to the older bucket still holding those keys:
 *
 *   m = h & (2^bits - 1)
 *   m < N  ?  m  :  m ^ 2^(bits-1)
 *
 ***/

import {
  is_non_negative_integer,
  validate_and_cast,
  type Brand,
} from "type_primitives";
import {
  HASH_MULTIPLIER,
  HASH_WIDTH,
  REPLACEMENT_CHAR,
} from "utils/constants";

export type BucketIndex = Brand<number, "bucket_index">;
export const as_bucket_index = (value: number) =>
  validate_and_cast<number, BucketIndex>(
    value,
    is_non_negative_integer,
    "BucketIndex must be a non-negative integer",
  );

const step = (h: number, byte: number): number =>
  (Math.imul(h, HASH_MULTIPLIER) + byte) >>> 0;

/**
 * Hash a key over its UTF-8 encoding without materialising the bytes.
 * Unpaired surrogates hash as U+FFFD, which is what an encoder would emit.
 */
export function hash_key(key: string): number {
  let h = 0;
  for (let i = 0; i < key.length; i++) {
    let cp = key.charCodeAt(i);

    if (cp >= 0xd800 && cp <= 0xdfff) {
      const next = i + 1 < key.length ? key.charCodeAt(i + 1) : 0;
      if (cp <= 0xdbff && next >= 0xdc00 && next <= 0xdfff) {
        cp = 0x10000 + ((cp - 0xd800) << 10) + (next - 0xdc00);
        i++;
      } else {
        cp = REPLACEMENT_CHAR;
      }
    }

    if (cp < 0x80) {
      h = step(h, cp);
    } else if (cp < 0x800) {
      h = step(h, 0xc0 | (cp >> 6));
      h = step(h, 0x80 | (cp & 0x3f));
    } else if (cp < 0x10000) {
      h = step(h, 0xe0 | (cp >> 12));
      h = step(h, 0x80 | ((cp >> 6) & 0x3f));
      h = step(h, 0x80 | (cp & 0x3f));
    } else {
      h = step(h, 0xf0 | (cp >> 18));
      h = step(h, 0x80 | ((cp >> 12) & 0x3f));
      h = step(h, 0x80 | ((cp >> 6) & 0x3f));
      h = step(h, 0x80 | (cp & 0x3f));
    }
  }
  return h;
}

/** Resolve a hash to a materialised bucket. Requires 2^(bits-1) < N <= 2^bits. */
export function bucket_address(
  hash: number,
  bits: number,
  bucket_count: number,
): BucketIndex {
  const m = (hash & (2 ** bits - 1)) >>> 0;
  return as_bucket_index(m < bucket_count ? m : m ^ (2 ** (bits - 1)));
}

/** Zero-padded binary rendering, most significant bit first. */
export function bit_string(value: number, width = HASH_WIDTH): string {
  return (value >>> 0).toString(2).padStart(width, "0").slice(-width);
}

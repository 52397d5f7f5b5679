/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: a BucketIndex and a raw hash are both numbers at runtime, but
 * Brand<number, "bucket_index"> cannot be passed where a plain hash is
 * expected to be resolved first.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};

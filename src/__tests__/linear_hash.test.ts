import { describe, expect, it } from "vitest";
import { LinearHashTable } from "../index";

const NIPPON = "私はガラスを食べられます。それは私を傷つけません。";

describe("linear hash table", () => {
  //=========================================================
  // Basic contract
  //=========================================================

  it("walks through insert, overwrite and remove", () => {
    const table = new LinearHashTable<number>();
    expect(table.lookup("abc")).toBeUndefined();

    table.upsert("abc", 64);
    table.upsert("abcdefghijklmnopq", 128);
    expect(table.lookup("abc")).toBe(64);
    expect(table.lookup("abc")).toBe(64);
    expect(table.lookup("abcdefghijklmnopq")).toBe(128);

    expect(table.upsert("abc", 256)).toBe(false);
    expect(table.lookup("abc")).toBe(256);

    expect(table.remove("abc")).toBe(256);
    expect(table.lookup("abc")).toBeUndefined();
    expect(table.lookup("abcd")).toBeUndefined();
    expect(table.lookup("abcdefghijklmnopq")).toBe(128);
  });

  it("round-trips mixed keys", () => {
    const table = new LinearHashTable<string>();
    const keys = ["", " ", "a", "A", "key with spaces", "tab\tkey", "x".repeat(1000)];
    for (const key of keys) expect(table.upsert(key, `value:${key}`)).toBe(true);
    for (const key of keys) expect(table.lookup(key)).toBe(`value:${key}`);
    expect(table.size).toBe(keys.length);
  });

  it("has no false positives for prefixes and extensions", () => {
    const table = new LinearHashTable<number>();
    table.upsert("abc", 1);
    expect(table.lookup("ab")).toBeUndefined();
    expect(table.lookup("abcd")).toBeUndefined();
    expect(table.lookup("ABC")).toBeUndefined();
    expect(table.lookup("never-inserted")).toBeUndefined();
  });

  it("second remove of a key is not found", () => {
    const table = new LinearHashTable<number>();
    table.upsert("gone", 1);
    expect(table.remove("gone")).toBe(1);
    expect(table.remove("gone")).toBeUndefined();
    expect(table.lookup("gone")).toBeUndefined();
  });

  //=========================================================
  // Unicode keys
  //=========================================================

  it("round-trips multi-byte text through insert, lookup and remove", () => {
    const table = new LinearHashTable<number>();
    table.upsert(NIPPON, 31337);
    expect(table.lookup(NIPPON)).toBe(31337);
    expect(table.remove(NIPPON)).toBe(31337);
    expect(table.lookup(NIPPON)).toBeUndefined();
  });

  it("keeps keys apart that differ only in non-ASCII characters", () => {
    const table = new LinearHashTable<string>();
    table.upsert("café", "accented");
    table.upsert("cafe", "plain");
    table.upsert("caf😀", "emoji");
    expect(table.lookup("café")).toBe("accented");
    expect(table.lookup("cafe")).toBe("plain");
    expect(table.lookup("caf😀")).toBe("emoji");
  });

  //=========================================================
  // Growth
  //=========================================================

  it("finds all 8192 sequential keys after growing", () => {
    const table = new LinearHashTable<number>();
    const n = 8192;
    for (let i = 0; i < n; i++) table.upsert(String(i), i);
    expect(table.len()).toBeGreaterThan(32);
    for (let i = 0; i < n; i++) expect(table.lookup(String(i))).toBe(i);
  });

  it("stays correct when removals interleave with growth", () => {
    const table = new LinearHashTable<number>({ initial_bucket_count: 2 });
    const n = 4000;
    // every third step removes k(i / 3), so k0..k1333 end up removed
    for (let i = 0; i < n; i++) {
      table.upsert(`k${i}`, i);
      if (i % 3 === 0) table.remove(`k${i / 3}`);
    }
    for (let i = 0; i < n; i++) {
      if (i * 3 < n) expect(table.lookup(`k${i}`)).toBeUndefined();
      else expect(table.lookup(`k${i}`)).toBe(i);
    }
    expect(table.size).toBe(n - 1334);
  });

  it("bucket count never decreases", () => {
    const table = new LinearHashTable<number>();
    let last = table.len();
    for (let i = 0; i < 5000; i++) {
      table.upsert(`grow-${i}`, i);
      if (i % 2 === 0) table.remove(`grow-${i}`);
      expect(table.len()).toBeGreaterThanOrEqual(last);
      last = table.len();
    }
  });
});

// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { StringMatcher, failureTable } from "./string-matcher";

function naiveContains(text: string, pattern: string): boolean {
  for (let i = 0; i + pattern.length <= text.length; i++) {
    let j = 0;
    while (j < pattern.length && text[i + j] === pattern[j]) j++;
    if (j === pattern.length) return true;
  }
  return false;
}

// Small deterministic LCG so the cross-check is reproducible.
function makeRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function randomString(rand: () => number, alphabet: string, length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += alphabet[Math.floor(rand() * alphabet.length)];
  }
  return out;
}

describe("failureTable", () => {
  test("no self-overlap", () => {
    expect(failureTable("abcd")).toEqual([0, 0, 0, 0]);
  });

  test("repeated character", () => {
    expect(failureTable("aaaa")).toEqual([0, 1, 2, 3]);
  });

  test("partial overlaps", () => {
    expect(failureTable("abcabd")).toEqual([0, 0, 0, 1, 2, 0]);
  });

  test("overlap that falls back more than once", () => {
    expect(failureTable("aabaaa")).toEqual([0, 1, 0, 1, 2, 2]);
  });

  test("single character", () => {
    expect(failureTable("x")).toEqual([0]);
  });
});

describe("StringMatcher", () => {
  test("empty pattern is rejected", () => {
    expect(() => new StringMatcher("")).toThrow(RangeError);
  });

  test("exposes its pattern and a frozen table", () => {
    const m = new StringMatcher("abab");
    expect(m.pattern).toBe("abab");
    expect(m.failureTable).toEqual([0, 0, 1, 2]);
    expect(Object.isFrozen(m.failureTable)).toBe(true);
  });

  test("finds a pattern at the start, middle and end", () => {
    const m = new StringMatcher("abc");
    expect(m.contains("abcxx")).toBe(true);
    expect(m.contains("xabcx")).toBe(true);
    expect(m.contains("xxabc")).toBe(true);
  });

  test("pattern equal to the text", () => {
    expect(new StringMatcher("iphone").contains("iphone")).toBe(true);
  });

  test("missing pattern", () => {
    expect(new StringMatcher("iphone").contains("I love my new i phone!")).toBe(false);
  });

  test("matching is case-sensitive", () => {
    expect(new StringMatcher("hello").contains("HELLO THERE")).toBe(false);
  });

  test("pattern longer than the text", () => {
    expect(new StringMatcher("abcdef").contains("abc")).toBe(false);
  });

  test("empty text never matches", () => {
    expect(new StringMatcher("a").contains("")).toBe(false);
  });

  test("mismatch after a long partial match falls back correctly", () => {
    expect(new StringMatcher("aab").contains("aaab")).toBe(true);
    expect(new StringMatcher("ababc").contains("abababc")).toBe(true);
    expect(new StringMatcher("aabaaa").contains("aabaabaaa")).toBe(true);
  });

  test("partial match at the end of the text is not a match", () => {
    expect(new StringMatcher("abcd").contains("xxabc")).toBe(false);
  });

  test("non-ASCII text", () => {
    expect(new StringMatcher("é").contains("café")).toBe(true);
    expect(new StringMatcher("😀").contains("hi 😀")).toBe(true);
    expect(new StringMatcher("😀").contains("hi 😁")).toBe(false);
  });

  test("repeated calls give the same answer", () => {
    const m = new StringMatcher("needle");
    const text = "haystack with a needle in it";
    const results = Array.from({ length: 5 }, () => m.contains(text));
    expect(results).toEqual([true, true, true, true, true]);
    expect(m.contains("haystack")).toBe(false);
    expect(m.contains(text)).toBe(true);
  });

  test("agrees with a naive scan on generated inputs", () => {
    const rand = makeRandom(42);
    for (let round = 0; round < 500; round++) {
      const pattern = randomString(rand, "ab", 1 + Math.floor(rand() * 5));
      const text = randomString(rand, "abc", Math.floor(rand() * 20));
      const expected = naiveContains(text, pattern);
      expect(new StringMatcher(pattern).contains(text), `${pattern} in ${text}`).toBe(expected);
      expect(expected).toBe(text.includes(pattern));
    }
  });
});

// SPDX-License-Identifier: Apache-2.0

/**
 * Knuth-Morris-Pratt failure table: `table[i]` is the length of the longest
 * proper prefix of `pattern.slice(0, i + 1)` that is also its suffix.
 */
export function failureTable(pattern: string): number[] {
  const table = new Array<number>(pattern.length).fill(0);
  let k = 0;
  for (let i = 1; i < pattern.length; i++) {
    const ch = pattern.charCodeAt(i);
    while (k > 0 && ch !== pattern.charCodeAt(k)) {
      k = table[k - 1];
    }
    if (ch === pattern.charCodeAt(k)) k++;
    table[i] = k;
  }
  return table;
}

/**
 * Substring containment test for one fixed pattern. The failure table is
 * built once in the constructor; `contains` keeps no state between calls.
 */
export class StringMatcher {
  readonly pattern: string;
  readonly failureTable: ReadonlyArray<number>;

  constructor(pattern: string) {
    if (pattern.length === 0) {
      throw new RangeError("StringMatcher pattern must not be empty");
    }
    this.pattern = pattern;
    this.failureTable = Object.freeze(failureTable(pattern));
  }

  contains(text: string): boolean {
    const pattern = this.pattern;
    const table = this.failureTable;
    const m = pattern.length;
    const n = text.length;
    let matched = 0;

    for (let i = 0; i < n; i++) {
      // No match can start before i - matched, so the rest of the text
      // must still be able to hold the rest of the pattern.
      if (n - i < m - matched) return false;

      const ch = text.charCodeAt(i);
      while (matched > 0 && ch !== pattern.charCodeAt(matched)) {
        matched = table[matched - 1];
      }
      if (ch === pattern.charCodeAt(matched)) matched++;
      if (matched === m) return true;
    }
    return false;
  }
}

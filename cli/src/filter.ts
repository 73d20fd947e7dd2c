// SPDX-License-Identifier: Apache-2.0
import type { Matcher } from "@boolmatch/shared";

export interface FilterOptions {
  invert: boolean;
}

/** Split text into lines, dropping the empty entry after a final newline. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function filterLines(matcher: Matcher, text: string, options: FilterOptions): string[] {
  return splitLines(text).filter((line) => matcher.query(line) !== options.invert);
}

// SPDX-License-Identifier: Apache-2.0
import type { QuerySyntaxError } from "@boolmatch/shared";

/**
 * Render a syntax error with the offending query line and a caret under the
 * reported position:
 *
 *     unmatched '(' at position 6
 *       "a" & ("b" | "c"
 *             ^
 */
export function formatSyntaxError(err: QuerySyntaxError, source: string): string {
  const lineStart = err.position === 0 ? 0 : source.lastIndexOf("\n", err.position - 1) + 1;
  const newline = source.indexOf("\n", err.position);
  const line = source.slice(lineStart, newline === -1 ? source.length : newline);
  // Keep tabs so the caret lines up with what the terminal shows.
  const pad = line.slice(0, err.position - lineStart).replace(/[^\t]/g, " ");
  return `${err.message}\n  ${line}\n  ${pad}^`;
}

// SPDX-License-Identifier: Apache-2.0
import { Matcher } from "@boolmatch/shared";
import { runCompliance } from "./compliance/run";
import { formatReport, type SuiteSummary } from "./compliance/reporter";
import { filterLines } from "./filter";
import { formatSyntaxError } from "./format";
import { errorMessage, log } from "./log";

export const EXIT_OK = 0;
export const EXIT_NO_MATCH = 1;
export const EXIT_BAD_INPUT = 2;

/** Where command output goes and where `filter` reads from; `null` is stdin. */
export interface CommandIO {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
  readInput(file: string | null): string;
}

function compile(query: string, verbose: boolean, io: CommandIO): Matcher | null {
  const compiled = Matcher.safeFrom(query);
  if (!compiled.success) {
    io.stderr(`Error: ${formatSyntaxError(compiled.error, query)}\n`);
    return null;
  }
  log(`Compiled query with literals: ${compiled.matcher.literals().map((l) => JSON.stringify(l)).join(", ")}`, verbose);
  return compiled.matcher;
}

export function runCheck(query: string, text: string, options: { verbose: boolean }, io: CommandIO): number {
  const matcher = compile(query, options.verbose, io);
  if (!matcher) return EXIT_BAD_INPUT;
  const matched = matcher.query(text);
  io.stdout(`${matched}\n`);
  return matched ? EXIT_OK : EXIT_NO_MATCH;
}

export function runFilter(
  query: string,
  files: string[],
  options: { invert: boolean; count: boolean; verbose: boolean },
  io: CommandIO,
): number {
  const matcher = compile(query, options.verbose, io);
  if (!matcher) return EXIT_BAD_INPUT;

  const sources = files.length > 0 ? files : [null];
  let selected = 0;
  for (const file of sources) {
    let text: string;
    try {
      text = io.readInput(file);
    } catch (err) {
      io.stderr(`Error: ${errorMessage(err)}\n`);
      return EXIT_BAD_INPUT;
    }
    const lines = filterLines(matcher, text, { invert: options.invert });
    log(`${file ?? "<stdin>"}: ${lines.length} lines selected`, options.verbose);
    selected += lines.length;
    if (!options.count) {
      for (const line of lines) io.stdout(`${line}\n`);
    }
  }

  if (options.count) io.stdout(`${selected}\n`);
  return selected > 0 ? EXIT_OK : EXIT_NO_MATCH;
}

export function runSuite(paths: string[], options: { verbose: boolean; color: boolean }, io: CommandIO): number {
  let summaries: SuiteSummary[];
  try {
    summaries = runCompliance({ paths, verbose: options.verbose });
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}\n`);
    return EXIT_BAD_INPUT;
  }
  const report = formatReport(summaries, { color: options.color });
  io.stderr(report.text);
  return report.passed ? EXIT_OK : EXIT_NO_MATCH;
}

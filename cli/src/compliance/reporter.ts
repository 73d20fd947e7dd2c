// SPDX-License-Identifier: Apache-2.0
import type { Expectation, TestResult } from "./local";

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface SuiteSummary {
  file: string;
  results: TestResult[];
}

export interface Report {
  text: string;
  passed: boolean;
}

function counted(n: number, singular: string, plural: string): string {
  return `${n} ${n === 1 ? singular : plural}`;
}

function describeExpectation(e: Expectation): string {
  if (e.kind === "error") return `expects ${e.errorKind} error`;
  const parts: string[] = [];
  if (e.matches > 0) parts.push(counted(e.matches, "match", "matches"));
  if (e.rejects > 0) parts.push(counted(e.rejects, "reject", "rejects"));
  return parts.join(", ");
}

function tally(passed: number, failed: number, paint: (code: string, s: string) => string): string {
  const parts = [paint(GREEN, `${passed} passed`)];
  if (failed > 0) parts.push(paint(RED, `${failed} failed`));
  return parts.join(", ");
}

/**
 * Render suite results as text for stderr: one line per case, each failed
 * assertion under its case, a tally per file and a grand total.
 */
export function formatReport(suites: SuiteSummary[], options: { color: boolean }): Report {
  const paint = (code: string, s: string): string => (options.color ? `${code}${s}${RESET}` : s);
  const lines: string[] = [];
  let totalPassed = 0;
  let totalFailed = 0;

  for (const suite of suites) {
    const failed = suite.results.filter((r) => !r.passed).length;
    const passed = suite.results.length - failed;
    totalPassed += passed;
    totalFailed += failed;

    lines.push("", paint(DIM, `── ${suite.file} ──`));
    for (const r of suite.results) {
      const icon = r.passed ? paint(GREEN, "✓") : paint(RED, "✗");
      lines.push(`  ${icon} ${r.name} ${paint(DIM, `(${describeExpectation(r.expectation)})`)}`);
      if (r.passed) continue;
      lines.push(`      ${paint(DIM, `query: ${r.query}`)}`);
      for (const f of r.failures) {
        lines.push(`      ${paint(RED, `${f.assertion}: expected ${f.expected}, got ${f.actual}`)}`);
      }
    }
    lines.push(`  ${suite.file}: ${tally(passed, failed, paint)}`);
  }

  lines.push("", `${tally(totalPassed, totalFailed, paint)} across ${counted(suites.length, "file", "files")}`, "");
  return { text: lines.join("\n"), passed: totalFailed === 0 };
}

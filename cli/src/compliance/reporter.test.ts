// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { formatReport, type SuiteSummary } from "./reporter";

const suites: SuiteSummary[] = [
  {
    file: "a.yaml",
    results: [
      {
        name: "and",
        query: '"a" & "b"',
        passed: true,
        failures: [],
        expectation: { kind: "texts", matches: 1, rejects: 2 },
      },
      {
        name: "or",
        query: '"a" | "b"',
        passed: false,
        failures: [{ assertion: "matches", expected: '"c" to match', actual: "no match" }],
        expectation: { kind: "texts", matches: 1, rejects: 0 },
      },
    ],
  },
  {
    file: "b.yaml",
    results: [
      {
        name: "empty",
        query: "",
        passed: true,
        failures: [],
        expectation: { kind: "error", errorKind: "parse" },
      },
    ],
  },
];

describe("formatReport", () => {
  test("plain report lists cases, failures and tallies", () => {
    const report = formatReport(suites, { color: false });
    expect(report.passed).toBe(false);
    expect(report.text).toBe(
      [
        "",
        "── a.yaml ──",
        "  ✓ and (1 match, 2 rejects)",
        "  ✗ or (1 match)",
        '      query: "a" | "b"',
        '      matches: expected "c" to match, got no match',
        "  a.yaml: 1 passed, 1 failed",
        "",
        "── b.yaml ──",
        "  ✓ empty (expects parse error)",
        "  b.yaml: 1 passed",
        "",
        "2 passed, 1 failed across 2 files",
        "",
      ].join("\n"),
    );
  });

  test("all passing", () => {
    const report = formatReport([suites[1]], { color: false });
    expect(report.passed).toBe(true);
    expect(report.text.endsWith("\n1 passed across 1 file\n")).toBe(true);
  });

  test("no suites", () => {
    expect(formatReport([], { color: false })).toEqual({ text: "\n0 passed across 0 files\n", passed: true });
  });

  test("colour wraps icons and tallies in ANSI codes", () => {
    const text = formatReport([suites[1]], { color: true }).text;
    expect(text).toContain("  \x1b[32m✓\x1b[0m empty \x1b[2m(expects parse error)\x1b[0m");
    expect(text).toContain("  b.yaml: \x1b[32m1 passed\x1b[0m");
  });
});

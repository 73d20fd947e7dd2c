// SPDX-License-Identifier: Apache-2.0
import { Matcher, type QuerySyntaxError } from "@boolmatch/shared";
import type { TestCase, ExpectedError } from "./loader";

export interface AssertionFailure {
  assertion: string;
  expected: string;
  actual: string;
}

/** What a case asserted: text outcomes, or a compile error of some kind. */
export type Expectation =
  | { kind: "texts"; matches: number; rejects: number }
  | { kind: "error"; errorKind: ExpectedError["kind"] };

export interface TestResult {
  name: string;
  query: string;
  passed: boolean;
  failures: AssertionFailure[];
  expectation: Expectation;
}

function checkError(expected: ExpectedError, error: QuerySyntaxError): AssertionFailure[] {
  const failures: AssertionFailure[] = [];
  if (error.kind !== expected.kind) {
    failures.push({
      assertion: "error",
      expected: `${expected.kind} error`,
      actual: `${error.kind} error: ${error.message}`,
    });
  }
  if (expected.message !== undefined && error.message !== expected.message) {
    failures.push({
      assertion: "message",
      expected: JSON.stringify(expected.message),
      actual: JSON.stringify(error.message),
    });
  }
  return failures;
}

function checkTexts(matcher: Matcher, tc: TestCase): AssertionFailure[] {
  const failures: AssertionFailure[] = [];

  for (const text of tc.matches ?? []) {
    if (!matcher.query(text)) {
      failures.push({ assertion: "matches", expected: `${JSON.stringify(text)} to match`, actual: "no match" });
    }
  }

  for (const text of tc.rejects ?? []) {
    if (matcher.query(text)) {
      failures.push({ assertion: "rejects", expected: `${JSON.stringify(text)} not to match`, actual: "match" });
    }
  }

  return failures;
}

export function runLocalTest(tc: TestCase): TestResult {
  const compiled = Matcher.safeFrom(tc.query);
  let failures: AssertionFailure[];
  let expectation: Expectation;

  if (tc.error) {
    expectation = { kind: "error", errorKind: tc.error.kind };
    failures = compiled.success
      ? [{ assertion: "error", expected: `${tc.error.kind} error`, actual: "query compiled" }]
      : checkError(tc.error, compiled.error);
  } else {
    expectation = { kind: "texts", matches: tc.matches?.length ?? 0, rejects: tc.rejects?.length ?? 0 };
    failures = compiled.success
      ? checkTexts(compiled.matcher, tc)
      : [{ assertion: "compile", expected: "a valid query", actual: compiled.error.message }];
  }

  return {
    name: tc.name,
    query: tc.query,
    passed: failures.length === 0,
    failures,
    expectation,
  };
}

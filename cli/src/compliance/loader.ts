// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const ExpectedErrorSchema = z.object({
  kind: z.enum(["lex", "parse"]),
  message: z.string().optional(),
});

const TestCaseSchema = z
  .object({
    name: z.string().min(1),
    query: z.string(),
    matches: z.array(z.string()).optional(),
    rejects: z.array(z.string()).optional(),
    error: ExpectedErrorSchema.optional(),
  })
  .strict()
  .refine((tc) => !(tc.error && (tc.matches || tc.rejects)), {
    message: "error cannot be combined with matches or rejects",
  })
  .refine((tc) => tc.error !== undefined || (tc.matches?.length ?? 0) + (tc.rejects?.length ?? 0) > 0, {
    message: "at least one of matches, rejects or error is required",
  });

export type TestCase = z.infer<typeof TestCaseSchema>;
export type ExpectedError = z.infer<typeof ExpectedErrorSchema>;

export interface Suite {
  file: string;
  cases: TestCase[];
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Validate the text of one YAML suite. `file` only labels error messages. */
export function parseSuite(raw: string, file: string): Suite {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${file}: YAML parse error: ${msg}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`${file}: expected a YAML array of test cases`);
  }

  const cases: TestCase[] = [];
  parsed.forEach((entry: unknown, idx) => {
    const result = TestCaseSchema.safeParse(entry);
    if (!result.success) {
      throw new Error(`${file}: test case ${idx}: ${describeIssues(result.error)}`);
    }
    cases.push(result.data);
  });
  return { file, cases };
}

export function loadSuite(filePath: string): Suite {
  return parseSuite(fs.readFileSync(filePath, "utf-8"), path.basename(filePath));
}

export function loadAllSuites(suitesDir: string): Suite[] {
  if (!fs.existsSync(suitesDir)) {
    throw new Error(`Suites directory not found: ${suitesDir}`);
  }
  const files = fs.readdirSync(suitesDir)
    .filter(f => f.endsWith(".yaml") || f.endsWith(".yml"))
    .sort();
  if (files.length === 0) {
    throw new Error(`No suite files found in ${suitesDir}`);
  }
  return files.map(f => loadSuite(path.join(suitesDir, f)));
}

/** Load suites from a mix of suite files and directories of suites. */
export function loadSuites(paths: string[]): Suite[] {
  return paths.flatMap((p) => (fs.statSync(p).isDirectory() ? loadAllSuites(p) : [loadSuite(p)]));
}

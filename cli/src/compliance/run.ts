// SPDX-License-Identifier: Apache-2.0
import path from "node:path";
import { fileURLToPath } from "node:url";
import { log } from "../log";
import { loadSuites } from "./loader";
import { runLocalTest } from "./local";
import type { SuiteSummary } from "./reporter";

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "..");
export const SUITES_DIR = path.join(PROJECT_ROOT, "cli", "suites");

/** Load and run every case in the given suite files or directories. */
export function runCompliance(options: { paths: string[]; verbose: boolean }): SuiteSummary[] {
  const paths = options.paths.length > 0 ? options.paths : [SUITES_DIR];
  log(`Loading suites from ${paths.join(", ")}`, options.verbose);

  return loadSuites(paths).map((suite) => {
    log(`${suite.file}: ${suite.cases.length} cases`, options.verbose);
    return { file: suite.file, results: suite.cases.map((tc) => runLocalTest(tc)) };
  });
}

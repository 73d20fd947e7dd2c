// SPDX-License-Identifier: Apache-2.0

/**
 * Diagnostics go to stderr so that stdout carries only results and can be
 * piped into other tools. `log` prints only when `condition` holds (usually
 * the `--verbose` flag).
 */
export function log(message: string, condition: boolean): void {
  if (condition) {
    process.stderr.write(`${message}\n`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


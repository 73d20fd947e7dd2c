// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import cac from "cac";
import { runCheck, runFilter, runSuite, type CommandIO } from "./commands";

process.stdout.on("error", (err: NodeJS.ErrnoException) => {
  if (err.code === "EPIPE") process.exit(0);
  throw err;
});

const io: CommandIO = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
  readInput: (file) => fs.readFileSync(file ?? process.stdin.fd, "utf-8"),
};

const cli = cac("boolmatch");

cli
  .command("check <query> <text>", "Test one text against a query (exit 0 on match, 1 otherwise)")
  .option("--verbose", "Print diagnostics to stderr", { default: false })
  .action((query: string, text: string, options: { verbose: boolean }) => {
    process.exit(runCheck(query, String(text), options, io));
  });

cli
  .command("filter <query> [...files]", "Print the lines of the files (or stdin) that match a query")
  .option("--invert", "Print the lines that do not match", { default: false })
  .option("--count", "Print only the number of selected lines", { default: false })
  .option("--verbose", "Print diagnostics to stderr", { default: false })
  .action((query: string, files: string[], options: { invert: boolean; count: boolean; verbose: boolean }) => {
    process.exit(runFilter(query, files, options, io));
  });

cli
  .command("suite [...paths]", "Run YAML compliance suites (files or directories; default cli/suites)")
  .option("--verbose", "Print diagnostics to stderr", { default: false })
  .action((paths: string[], options: { verbose: boolean }) => {
    process.exit(runSuite(paths, { verbose: options.verbose, color: process.stderr.isTTY === true }, io));
  });

cli.help();
cli.parse();

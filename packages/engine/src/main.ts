#!/usr/bin/env tsx
/**
 * @txledger/engine — Command-line entry point.
 *
 *   txledger transactions.csv > accounts.csv
 *
 * Reads the CSV file, writes the account report to stdout and
 * diagnostics to stderr. Exit codes: 0 success, 1 fatal error, 2 usage.
 */

import { open } from "node:fs/promises";
import chalk from "chalk";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runEngine } from "./engine.js";

const USAGE = "usage: txledger <transactions.csv>";

async function main(args: readonly string[]): Promise<number> {
  const path = args[0];
  if (path === undefined || path === "") {
    process.stderr.write(`${chalk.yellow(USAGE)}\n`);
    return 2;
  }

  const config = loadConfig();
  const logger = createLogger(config);

  const handle = await open(path, "r");
  const input = handle.createReadStream({ encoding: "utf8" });

  try {
    await runEngine({ input, output: process.stdout, logger });
  } finally {
    input.destroy();
  }

  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${chalk.red(`error: ${message}`)}\n`);
    process.exitCode = 1;
  },
);

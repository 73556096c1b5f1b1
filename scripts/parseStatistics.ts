#!/usr/bin/env node
import process from "node:process";

import { executeStatisticsCli, parseStatisticsCliOptions } from "../src/statistics/cli.js";

/**
 * CLI entrypoint gathering the statistics of one or more experiment result
 * directories (or explicit result files) into a single catalogue.
 */
async function main(): Promise<void> {
  const options = parseStatisticsCliOptions(process.argv.slice(2));
  await executeStatisticsCli(options, process.env, console);
}

main().catch((error) => {
  console.error("Failed to gather experiment statistics:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});

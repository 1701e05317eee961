#!/usr/bin/env node

/**
 * code-census entry point
 *
 * Usage:
 *   code-census                         # Analyze the current directory
 *   code-census path/to/project         # Analyze another project
 *   code-census --config census.json    # Use an explicit config file
 */

import { resolve } from "node:path";
import { runAnalysis } from "./src/analysis/runAnalysis.js";
import { AnalysisError, errorMessage } from "./src/errors/AnalysisError.js";

const USAGE = "Usage: code-census [projectRoot] [--config <path>]";

interface CliArgs {
  projectRoot: string;
  configPath?: string;
}

const parseArgs = (args: string[]): CliArgs | undefined => {
  let projectRoot: string | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config") {
      configPath = args[++i];
      if (configPath === undefined) return undefined;
    } else if (
      arg === undefined ||
      arg.startsWith("-") ||
      projectRoot !== undefined
    ) {
      return undefined;
    } else {
      projectRoot = arg;
    }
  }

  return {
    projectRoot: resolve(projectRoot ?? process.cwd()),
    configPath: configPath === undefined ? undefined : resolve(configPath),
  };
};

const args = process.argv.slice(2);
const cliArgs = args.includes("--help") ? undefined : parseArgs(args);

if (cliArgs === undefined) {
  console.error(USAGE);
  process.exitCode = args.includes("--help") ? 0 : 1;
} else {
  try {
    runAnalysis(cliArgs);
    process.exitCode = 0;
  } catch (e) {
    const label = e instanceof AnalysisError ? e.name : "Unexpected error";
    console.error(`[code-census] ${label}: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
}

#!/usr/bin/env node
/**
 * Methodical CLI - command line front end for the Methodical checker
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });

export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";

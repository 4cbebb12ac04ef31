/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand } from "../commands/check.js";
import { inferCommand } from "../commands/infer.js";
import type { MethodicalConfig } from "../types.js";
import { EXIT, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`methodical v${VERSION}`);
    return EXIT.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT.ok;
  }

  if (parsed.command !== "check" && parsed.command !== "infer") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'methodical --help' for usage information");
    return EXIT.usage;
  }

  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      console.error(`Error: ${message}`);
    }
    return EXIT.usage;
  }

  // The config file is optional when the program is named on the command line
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: MethodicalConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT.loadFailure;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : cwd,
    parsed.programFile,
    cwd
  );

  if (!config.programPath) {
    console.error("Error: No program given");
    console.error(
      "Name a program file or set 'program' in methodical.json"
    );
    return EXIT.noProgram;
  }

  const result =
    parsed.command === "check"
      ? checkCommand(config, config.programPath)
      : inferCommand(config, config.programPath);

  if (!result.ok) {
    console.error(result.error);
    return EXIT.loadFailure;
  }
  return result.value.passed ? EXIT.ok : EXIT.diagnostics;
};

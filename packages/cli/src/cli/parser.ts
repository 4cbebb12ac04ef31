/**
 * CLI argument parser
 */

import type { CliOptions, OutputFormat } from "../types.js";

export type ParsedArgs = {
  command: string;
  programFile?: string;
  options: CliOptions;
  /** Problems with flag values; the dispatcher reports them */
  errors: string[];
};

const parseFormat = (value: string | undefined): OutputFormat | undefined => {
  switch (value) {
    case "text":
    case "json":
      return value;
    default:
      return undefined;
  }
};

const parseCount = (value: string | undefined): number | undefined => {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const count = Number.parseInt(value, 10);
  return count > 0 ? count : undefined;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  const errors: string[] = [];
  let command = "";
  let programFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after the command
    if (command && !programFile && !arg.startsWith("-")) {
      programFile = arg;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, errors: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, errors: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-f":
      case "--format": {
        const value = args[++i];
        const format = parseFormat(value);
        if (format) {
          options.format = format;
        } else {
          errors.push(`Invalid format '${value ?? ""}': expected text or json`);
        }
        break;
      }
      case "-m":
      case "--max-diagnostics": {
        const value = args[++i];
        const count = parseCount(value);
        if (count !== undefined) {
          options.maxDiagnostics = count;
        } else {
          errors.push(
            `Invalid diagnostic limit '${value ?? ""}': expected a positive integer`
          );
        }
        break;
      }
      default:
        errors.push(`Unknown option '${arg}'`);
    }
  }

  return { command, programFile, options, errors };
};

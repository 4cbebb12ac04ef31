/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { CONFIG_FILE_NAME } from "./cli/constants.js";
import type {
  MethodicalConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Check the fields of a parsed methodical.json
 */
export const validateConfig = (
  data: unknown
): Result<MethodicalConfig, string> => {
  if (!isRecord(data)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const { program: rawProgram, maxDiagnostics: rawLimit } = data;

  const program = typeof rawProgram === "string" ? rawProgram : undefined;
  if (rawProgram !== undefined && program === undefined) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'program' must be a string`,
    };
  }

  const format =
    data.format === "json" ? "json" : data.format === "text" ? "text" : undefined;
  if (data.format !== undefined && format === undefined) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'format' must be "text" or "json"`,
    };
  }

  const maxDiagnostics =
    typeof rawLimit === "number" && Number.isInteger(rawLimit) && rawLimit > 0
      ? rawLimit
      : undefined;
  if (rawLimit !== undefined && maxDiagnostics === undefined) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'maxDiagnostics' must be a positive integer`,
    };
  }

  return { ok: true, value: { program, format, maxDiagnostics } };
};

/**
 * Load methodical.json
 */
export const loadConfig = (
  configPath: string
): Result<MethodicalConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return validateConfig(JSON.parse(content));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find methodical.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing methodical.json; the config's
 *   program path is relative to it
 * @param programFile - Program named on the command line, relative to workingDir
 */
export const resolveConfig = (
  config: MethodicalConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  programFile?: string,
  workingDir: string = process.cwd()
): ResolvedConfig => {
  const programPath = programFile
    ? resolve(workingDir, programFile)
    : config.program
      ? resolve(projectRoot, config.program)
      : undefined;

  return {
    projectRoot,
    programPath,
    format: cliOptions.format ?? config.format ?? "text",
    maxDiagnostics: cliOptions.maxDiagnostics ?? config.maxDiagnostics,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};

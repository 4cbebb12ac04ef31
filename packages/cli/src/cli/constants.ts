/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

const readVersion = (json: unknown): string =>
  typeof json === "object" &&
  json !== null &&
  "version" in json &&
  typeof json.version === "string"
    ? json.version
    : "0.0.0";

export const VERSION = readVersion(packageJson);

export const CONFIG_FILE_NAME = "methodical.json";

/**
 * Process exit codes
 */
export const EXIT = {
  ok: 0,
  diagnostics: 1,
  usage: 2,
  noProgram: 3,
  loadFailure: 4,
} as const;

/**
 * Type definitions for the Methodical CLI
 */

export type { Result } from "@methodical/checker";

export type OutputFormat = "text" | "json";

/**
 * Contents of methodical.json
 */
export type MethodicalConfig = {
  /** Program description, relative to the config file */
  readonly program?: string;
  readonly format?: OutputFormat;
  readonly maxDiagnostics?: number;
};

export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  format?: OutputFormat;
  maxDiagnostics?: number;
};

export type ResolvedConfig = {
  readonly projectRoot: string;
  /** Absolute path of the program description, if one was given */
  readonly programPath: string | undefined;
  readonly format: OutputFormat;
  /** Undefined means every diagnostic is printed */
  readonly maxDiagnostics: number | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

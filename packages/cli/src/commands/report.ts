/**
 * Diagnostic rendering shared by the commands
 */

import {
  diagnosticName,
  formatDiagnostic,
  type Diagnostic,
} from "@methodical/checker";
import type { OutputFormat } from "../types.js";

/**
 * Keep at most `limit` diagnostics; `omitted` counts the rest
 */
export const limitDiagnostics = (
  diagnostics: readonly Diagnostic[],
  limit: number | undefined
): { readonly shown: readonly Diagnostic[]; readonly omitted: number } => {
  if (limit === undefined || diagnostics.length <= limit) {
    return { shown: diagnostics, omitted: 0 };
  }
  return {
    shown: diagnostics.slice(0, limit),
    omitted: diagnostics.length - limit,
  };
};

export const renderDiagnosticsText = (
  diagnostics: readonly Diagnostic[],
  limit: number | undefined
): string[] => {
  const { shown, omitted } = limitDiagnostics(diagnostics, limit);
  const lines = shown.map(formatDiagnostic);
  if (omitted > 0) {
    lines.push(`... and ${omitted} more`);
  }
  return lines;
};

export const diagnosticToJson = (diagnostic: Diagnostic) => ({
  code: diagnostic.code,
  kind: diagnosticName(diagnostic.code),
  severity: diagnostic.severity,
  message: diagnostic.message,
  ...(diagnostic.location ? { location: diagnostic.location } : {}),
  ...(diagnostic.hint ? { hint: diagnostic.hint } : {}),
  ...(diagnostic.missing ? { missing: diagnostic.missing } : {}),
});

/**
 * Print a command's output in the configured format
 */
export const printLines = (
  format: OutputFormat,
  lines: readonly string[],
  json: unknown
): void => {
  if (format === "json") {
    console.log(JSON.stringify(json, null, 2));
    return;
  }
  for (const line of lines) {
    console.log(line);
  }
};

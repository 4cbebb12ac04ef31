/**
 * methodical check command - infer every class and check every site
 */

import {
  analyzeProgram,
  formatMethodNames,
  type AnalysisResult,
} from "@methodical/checker";
import type { ResolvedConfig, Result } from "../types.js";
import { loadProgram } from "./load.js";
import {
  diagnosticToJson,
  limitDiagnostics,
  printLines,
  renderDiagnosticsText,
} from "./report.js";

export type CheckOutcome = {
  readonly passed: boolean;
};

type RenderOptions = Pick<ResolvedConfig, "maxDiagnostics" | "quiet" | "verbose">;

export const renderCheckText = (
  result: AnalysisResult,
  options: RenderOptions
): string[] => {
  if (!result.ok) {
    const { stage, diagnostics } = result.error;
    const lines = renderDiagnosticsText(diagnostics, options.maxDiagnostics);
    if (!options.quiet) {
      lines.push(
        `✗ ${stage} pass failed with ${diagnostics.length} error(s)`
      );
    }
    return lines;
  }

  const lines: string[] = [];
  const report = result.value;
  if (options.verbose) {
    for (const [name, type] of report.classTypes) {
      lines.push(`  ${name} ${formatMethodNames(type.names)}`);
    }
  }
  if (!options.quiet) {
    lines.push(
      `✓ ${report.sites.length} site(s) checked, ${report.passedChecks} check(s) passed`
    );
  }
  return lines;
};

export const checkResultToJson = (
  result: AnalysisResult,
  maxDiagnostics: number | undefined
): unknown => {
  if (!result.ok) {
    const { shown, omitted } = limitDiagnostics(
      result.error.diagnostics,
      maxDiagnostics
    );
    return {
      ok: false,
      stage: result.error.stage,
      diagnostics: shown.map(diagnosticToJson),
      omitted,
    };
  }

  return {
    ok: true,
    classes: Object.fromEntries(
      [...result.value.classTypes].map(([name, type]) => [name, type.names])
    ),
    sites: result.value.sites.length,
    passedChecks: result.value.passedChecks,
  };
};

/**
 * Analyse the configured program and print the outcome
 */
export const checkCommand = (
  config: ResolvedConfig,
  programPath: string
): Result<CheckOutcome, string> => {
  const program = loadProgram(programPath);
  if (!program.ok) {
    return program;
  }

  if (config.verbose && config.format === "text") {
    console.log(
      `Checking ${programPath}: ${program.value.methods.length} method(s), ${program.value.classes.length} class(es), ${program.value.sites.length} site(s)`
    );
  }

  const result = analyzeProgram(program.value);
  printLines(
    config.format,
    renderCheckText(result, config),
    checkResultToJson(result, config.maxDiagnostics)
  );

  return { ok: true, value: { passed: result.ok } };
};

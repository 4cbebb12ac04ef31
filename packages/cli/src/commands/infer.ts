/**
 * methodical infer command - print the inferred method-set of every class
 */

import {
  formatMethodNames,
  runDeclarationPass,
  runInferencePass,
  type Diagnostic,
  type MethodSetType,
  type ProgramInput,
  type Result,
} from "@methodical/checker";
import type { ResolvedConfig } from "../types.js";
import { loadProgram } from "./load.js";
import {
  diagnosticToJson,
  limitDiagnostics,
  printLines,
  renderDiagnosticsText,
} from "./report.js";

export type InferOutcome = {
  readonly passed: boolean;
};

/**
 * Run the passes up to and including inference; checking is skipped
 */
export const inferClassTypes = (
  program: ProgramInput
): Result<ReadonlyMap<string, MethodSetType>, readonly Diagnostic[]> => {
  const declared = runDeclarationPass(program);
  if (!declared.ok) {
    return declared;
  }
  const inferred = runInferencePass(declared.value, program);
  if (!inferred.ok) {
    return inferred;
  }
  return { ok: true, value: inferred.value.classTypes };
};

export const renderInferText = (
  result: Result<ReadonlyMap<string, MethodSetType>, readonly Diagnostic[]>,
  maxDiagnostics: number | undefined
): string[] =>
  result.ok
    ? [...result.value].map(
        ([name, type]) => `${name} ${formatMethodNames(type.names)}`
      )
    : renderDiagnosticsText(result.error, maxDiagnostics);

export const inferResultToJson = (
  result: Result<ReadonlyMap<string, MethodSetType>, readonly Diagnostic[]>,
  maxDiagnostics: number | undefined
): unknown => {
  if (!result.ok) {
    const { shown, omitted } = limitDiagnostics(result.error, maxDiagnostics);
    return { ok: false, diagnostics: shown.map(diagnosticToJson), omitted };
  }
  return {
    ok: true,
    classes: Object.fromEntries(
      [...result.value].map(([name, type]) => [name, type.names])
    ),
  };
};

export const inferCommand = (
  config: ResolvedConfig,
  programPath: string
): Result<InferOutcome, string> => {
  const program = loadProgram(programPath);
  if (!program.ok) {
    return program;
  }

  const result = inferClassTypes(program.value);
  printLines(
    config.format,
    renderInferText(result, config.maxDiagnostics),
    inferResultToJson(result, config.maxDiagnostics)
  );

  return { ok: true, value: { passed: result.ok } };
};

/**
 * Analysis orchestrator - runs the passes with their barriers
 */

import type { Diagnostic } from "../types/diagnostic.js";
import type { MethodSetType } from "../types/method-set.js";
import type { ProgramInput } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import type { FrozenMethodRegistry } from "../registry/index.js";
import type { SiteReport } from "../checker/index.js";
import {
  runCheckingPass,
  runDeclarationPass,
  runInferencePass,
} from "./passes.js";

export type AnalysisStage = "declaration" | "inference" | "checking";

export type AnalysisReport = {
  readonly registry: FrozenMethodRegistry;
  readonly classTypes: ReadonlyMap<string, MethodSetType>;
  readonly sites: readonly SiteReport[];
  /** Number of individual checks (arguments, returns, assignments) that passed */
  readonly passedChecks: number;
};

export type AnalysisFailure = {
  /** Pass that reported the diagnostics; later passes did not run */
  readonly stage: AnalysisStage;
  readonly diagnostics: readonly Diagnostic[];
  /** Class method-sets, when inference completed */
  readonly classTypes?: ReadonlyMap<string, MethodSetType>;
};

export type AnalysisResult = Result<AnalysisReport, AnalysisFailure>;

/**
 * Analyse a parsed program.
 *
 * A declaration or inference failure aborts the run before checking, since
 * checks against an inconsistent registry would be meaningless. Checking
 * failures are reported all together. The result is either a report or a
 * non-empty diagnostic list, and is the same for the same input every time.
 */
export const analyzeProgram = (program: ProgramInput): AnalysisResult => {
  const declared = runDeclarationPass(program);
  if (!declared.ok) {
    return error({ stage: "declaration", diagnostics: declared.error });
  }

  const inferred = runInferencePass(declared.value, program);
  if (!inferred.ok) {
    return error({ stage: "inference", diagnostics: inferred.error });
  }

  const checked = runCheckingPass(inferred.value, program);
  if (checked.diagnostics.length > 0) {
    return error({
      stage: "checking",
      diagnostics: checked.diagnostics,
      classTypes: checked.classTypes,
    });
  }

  return ok({
    registry: checked.registry,
    classTypes: checked.classTypes,
    sites: checked.sites,
    passedChecks: checked.sites.reduce(
      (count, site) =>
        count + site.verdicts.filter((v) => v.state === "passed").length,
      0
    ),
  });
};

/**
 * Analysis - Public API
 */

export {
  analyzeProgram,
  type AnalysisStage,
  type AnalysisReport,
  type AnalysisFailure,
  type AnalysisResult,
} from "./orchestrator.js";
export {
  runDeclarationPass,
  runInferencePass,
  runCheckingPass,
  type DeclaredProgram,
  type InferredProgram,
  type CheckedProgram,
} from "./passes.js";

/**
 * Methodical checker - method registry, method-set inference, type lattice
 * and compatibility checking
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  errorAt,
  diagnosticName,
  formatDiagnostic,
  formatLocation,
  dedupeDiagnostics,
  createFirstReportFilter,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/method-set.js";
export * from "./types/program.js";
export * from "./types/type-expression.js";

export * from "./registry/index.js";
export * from "./lattice/index.js";
export * from "./inference/index.js";
export * from "./checker/index.js";
export * from "./analysis/index.js";
export * from "./loader/index.js";

/**
 * Diagnostic types for the Methodical checker
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Declaration consistency (MTH1001-MTH1099)
  | "MTH1001" // Method redeclared with a different signature
  | "MTH1002" // Unknown method
  | "MTH1003" // Interface alias redefined with a different type
  | "MTH1004" // Unknown interface alias
  | "MTH1005" // Circular interface alias
  | "MTH1006" // Interface alias references a class type
  | "MTH1007" // Method declared after the registry was frozen
  // Inference (MTH2001-MTH2099)
  | "MTH2001" // Undeclared method implemented or required
  | "MTH2002" // Ambiguous method reference
  | "MTH2003" // Class defined twice in one program
  | "MTH2004" // Unknown class
  // Satisfaction (MTH3001-MTH3099)
  | "MTH3001" // Declared interface not fully implemented
  | "MTH3002" // Type mismatch
  | "MTH3003" // Wrong number of arguments
  // Program loading (MTH9001-MTH9005)
  | "MTH9001" // Program file not found
  | "MTH9002" // Failed to read program file
  | "MTH9003" // Invalid JSON in program file
  | "MTH9004" // Program file must be an object
  | "MTH9005"; // Invalid program field

const DIAGNOSTIC_NAMES: Readonly<Record<DiagnosticCode, string>> = {
  MTH1001: "DuplicateSignatureError",
  MTH1002: "UnknownMethodError",
  MTH1003: "DuplicateAliasError",
  MTH1004: "UnknownAliasError",
  MTH1005: "CircularAliasError",
  MTH1006: "AliasClassReferenceError",
  MTH1007: "RegistryFrozenError",
  MTH2001: "UndeclaredMethodError",
  MTH2002: "AmbiguousMethodReferenceError",
  MTH2003: "DuplicateClassError",
  MTH2004: "UnknownClassError",
  MTH3001: "IncompleteInterfaceError",
  MTH3002: "TypeMismatchError",
  MTH3003: "ArityMismatchError",
  MTH9001: "ProgramNotFoundError",
  MTH9002: "ProgramReadError",
  MTH9003: "ProgramSyntaxError",
  MTH9004: "ProgramShapeError",
  MTH9005: "ProgramFieldError",
};

/**
 * Name of the error kind a code stands for, e.g. "TypeMismatchError"
 */
export const diagnosticName = (code: DiagnosticCode): string =>
  DIAGNOSTIC_NAMES[code];

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  /** Method names a type failed to supply (MTH3001, MTH3002) */
  readonly missing?: readonly string[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  missing?: readonly string[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  missing,
});

/**
 * Shorthand for the common case: an error at an optional location
 */
export const errorAt = (
  code: DiagnosticCode,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => createDiagnostic(code, "error", message, location, hint);

export const formatLocation = (location: SourceLocation): string =>
  `${location.file}:${location.line}:${location.column}`;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(formatLocation(diagnostic.location));
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

/**
 * Drop repeats of the same code and message at the same place, keeping
 * the first occurrence
 */
export const dedupeDiagnostics = (
  diagnostics: readonly Diagnostic[]
): readonly Diagnostic[] => diagnostics.filter(createFirstReportFilter());

/**
 * Predicate that accepts a diagnostic only the first time its code, message
 * and location are seen
 */
export const createFirstReportFilter = (): ((
  diagnostic: Diagnostic
) => boolean) => {
  const seen = new Set<string>();
  return (diagnostic) => {
    const key = [
      diagnostic.code,
      diagnostic.message,
      diagnostic.location ? formatLocation(diagnostic.location) : "",
    ].join("|");
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  };
};

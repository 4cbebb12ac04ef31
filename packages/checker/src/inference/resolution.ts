/**
 * Method reference resolution inside a class body
 */

import { errorAt, type Diagnostic, type SourceLocation } from "../types/diagnostic.js";
import type { MethodImport } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import {
  findByUnqualifiedName,
  hasMethod,
  isQualified,
  unqualifiedName,
  type FrozenMethodRegistry,
} from "../registry/index.js";

/**
 * Name an import is visible under inside the class
 */
export const importLocalName = (imported: MethodImport): string =>
  imported.alias ?? unqualifiedName(imported.qualifiedName);

const ambiguous = (
  reference: string,
  candidates: readonly string[],
  location: SourceLocation | undefined
): Diagnostic =>
  errorAt(
    "MTH2002",
    `Method reference '${reference}' is ambiguous: ${candidates.map((c) => `'${c}'`).join(", ")}`,
    location,
    "Write the qualified name of the method you mean"
  );

/**
 * Resolve a method reference to a declared qualified name.
 *
 * An exact declared name always wins. A qualified reference must be
 * declared as written. An unqualified reference is looked up among the
 * class's imports first, then among every declared name sharing that
 * last segment; more than one distinct match is ambiguous.
 */
export const resolveMethodReference = (
  registry: FrozenMethodRegistry,
  imports: readonly MethodImport[],
  reference: string,
  location?: SourceLocation
): Result<string, Diagnostic> => {
  if (hasMethod(registry, reference)) {
    return ok(reference);
  }

  if (isQualified(reference)) {
    return error(
      errorAt("MTH2001", `Method '${reference}' is not declared`, location)
    );
  }

  const imported = [
    ...new Set(
      imports
        .filter((i) => importLocalName(i) === reference)
        .map((i) => i.qualifiedName)
    ),
  ];
  const [onlyImport] = imported;
  if (imported.length === 1 && onlyImport !== undefined) {
    return ok(onlyImport);
  }
  if (imported.length > 1) {
    return error(ambiguous(reference, imported, location));
  }

  const declared = findByUnqualifiedName(registry, reference);
  const [onlyDeclared] = declared;
  if (declared.length === 1 && onlyDeclared !== undefined) {
    return ok(onlyDeclared);
  }
  if (declared.length > 1) {
    return error(ambiguous(reference, declared, location));
  }

  return error(
    errorAt(
      "MTH2001",
      `Method '${reference}' is not declared`,
      location,
      "Declare the method before implementing it"
    )
  );
};

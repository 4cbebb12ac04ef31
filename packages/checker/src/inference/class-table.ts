/**
 * Class table - class definitions and their inferred method-sets
 */

import type { Diagnostic } from "../types/diagnostic.js";
import type { MethodSetType } from "../types/method-set.js";
import type { ClassDefinition } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import type { InferenceEngine } from "./infer.js";

export type ClassEntry = {
  readonly definition: ClassDefinition;
  readonly methodSet: MethodSetType;
};

export type ClassTable = {
  readonly entries: ReadonlyMap<string, ClassEntry>;
};

export const createClassTable = (): ClassTable => ({ entries: new Map() });

/**
 * Define (or redefine) a class. Inference runs here, so a class that
 * implements an undeclared method is rejected when it is defined.
 * Redefining a class replaces its entry and its inferred method-set.
 */
export const defineClass = (
  table: ClassTable,
  engine: InferenceEngine,
  definition: ClassDefinition
): Result<ClassTable, readonly Diagnostic[]> => {
  const inferred = engine.infer(definition);
  if (!inferred.ok) {
    return error(inferred.error);
  }

  const entries = new Map(table.entries);
  entries.set(definition.name, { definition, methodSet: inferred.value });
  return ok({ entries });
};

export const getClassType = (
  table: ClassTable,
  name: string
): MethodSetType | undefined => table.entries.get(name)?.methodSet;

/**
 * Class name to inferred method-set, in definition order
 */
export const getClassTypes = (
  table: ClassTable
): ReadonlyMap<string, MethodSetType> =>
  new Map(
    [...table.entries].map(([name, entry]) => [name, entry.methodSet] as const)
  );

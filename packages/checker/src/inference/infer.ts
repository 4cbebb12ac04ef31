/**
 * Method-set inference - the set of declared methods a class implements
 */

import { errorAt, type Diagnostic } from "../types/diagnostic.js";
import { createMethodSetType, type MethodSetType } from "../types/method-set.js";
import type { ClassDefinition } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import { hasMethod, type FrozenMethodRegistry } from "../registry/index.js";
import { resolveMethodReference } from "./resolution.js";

export type InferenceResult = Result<MethodSetType, readonly Diagnostic[]>;

/**
 * Infer a class's method-set: exactly the registry names it provides a
 * body for, directly or through an import. Every resolution failure in the
 * class is reported, not just the first.
 */
export const inferMethodSet = (
  registry: FrozenMethodRegistry,
  definition: ClassDefinition
): InferenceResult => {
  const imports = definition.imports ?? [];
  const names: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const imported of imports) {
    if (hasMethod(registry, imported.qualifiedName)) {
      names.push(imported.qualifiedName);
    } else {
      diagnostics.push(
        errorAt(
          "MTH2001",
          `Class '${definition.name}' imports undeclared method '${imported.qualifiedName}'`,
          imported.location ?? definition.location
        )
      );
    }
  }

  for (const method of definition.methods) {
    const resolved = resolveMethodReference(
      registry,
      imports,
      method.name,
      method.location ?? definition.location
    );
    if (resolved.ok) {
      names.push(resolved.value);
    } else {
      diagnostics.push(resolved.error);
    }
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }
  return ok(createMethodSetType(names, definition.name));
};

export type InferenceEngine = {
  readonly registry: FrozenMethodRegistry;
  readonly infer: (definition: ClassDefinition) => InferenceResult;
};

/**
 * Inference bound to one frozen registry, memoised by definition identity.
 * Definitions are immutable, so a changed class body arrives as a new
 * object and misses the cache.
 */
export const createInferenceEngine = (
  registry: FrozenMethodRegistry
): InferenceEngine => {
  const cache = new WeakMap<ClassDefinition, InferenceResult>();

  return {
    registry,
    infer: (definition) => {
      const cached = cache.get(definition);
      if (cached) return cached;
      const result = inferMethodSet(registry, definition);
      cache.set(definition, result);
      return result;
    },
  };
};

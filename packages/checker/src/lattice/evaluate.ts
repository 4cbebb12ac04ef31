/**
 * Type evaluation - reduce a TypeExpression to a MethodSetType
 *
 * Runs against a frozen registry, the alias table and (once inference has
 * finished) the inferred class method-sets. Alias results are memoised per
 * evaluator; an evaluator is scoped to one analysis run.
 */

import {
  errorAt,
  dedupeDiagnostics,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";
import {
  createMethodSetType,
  emptyMethodSet,
  withLabel,
  type MethodSetType,
} from "../types/method-set.js";
import type { MethodSignature, TypeExpression } from "../types/program.js";
import { referencesClass } from "../types/type-expression.js";
import { ok, error, collectResults, type Result } from "../types/result.js";
import { hasMethod, type FrozenMethodRegistry } from "../registry/index.js";
import type { AliasTable } from "./aliases.js";
import { createLatticeCache, type LatticeCache } from "./operations.js";

export type TypeEnvironment = {
  readonly registry: FrozenMethodRegistry;
  readonly aliases: AliasTable;
  /** Inferred class method-sets; undefined while classes are not yet inferred */
  readonly classTypes?: ReadonlyMap<string, MethodSetType>;
};

export type EvaluationResult = Result<MethodSetType, readonly Diagnostic[]>;

export type TypeEvaluator = {
  readonly evaluate: (
    type: TypeExpression,
    location?: SourceLocation
  ) => EvaluationResult;
  readonly resolveAlias: (
    name: string,
    location?: SourceLocation
  ) => EvaluationResult;
  readonly lattice: LatticeCache;
};

export const createTypeEvaluator = (
  env: TypeEnvironment,
  lattice: LatticeCache = createLatticeCache()
): TypeEvaluator => {
  const aliasResults = new Map<string, EvaluationResult>();

  const resolveAlias = (
    name: string,
    location: SourceLocation | undefined,
    resolving: readonly string[]
  ): EvaluationResult => {
    if (resolving.includes(name)) {
      const cycle = [...resolving.slice(resolving.indexOf(name)), name];
      return error([
        errorAt(
          "MTH1005",
          `Interface '${name}' refers to itself: ${cycle.join(" -> ")}`,
          location
        ),
      ]);
    }

    const cached = aliasResults.get(name);
    if (cached) return cached;

    const alias = env.aliases.get(name);
    if (!alias) {
      return error([
        errorAt("MTH1004", `Unknown interface '${name}'`, location),
      ]);
    }

    const underlying = evaluate(alias.type, alias.location ?? location, [
      ...resolving,
      name,
    ]);
    const result: EvaluationResult = underlying.ok
      ? ok(withLabel(underlying.value, name))
      : underlying;

    // Only top-level resolutions are final; a nested one may still be part of a cycle
    if (resolving.length === 0) {
      aliasResults.set(name, result);
    }
    return result;
  };

  const evaluate = (
    type: TypeExpression,
    location: SourceLocation | undefined,
    resolving: readonly string[]
  ): EvaluationResult => {
    switch (type.kind) {
      case "methods": {
        const undeclared = [...new Set(type.names)].filter(
          (name) => !hasMethod(env.registry, name)
        );
        if (undeclared.length > 0) {
          return error(
            undeclared.map((name) =>
              errorAt(
                "MTH2001",
                `Type requires undeclared method '${name}'`,
                location
              )
            )
          );
        }
        return ok(createMethodSetType(type.names));
      }

      case "alias":
        return resolveAlias(type.name, location, resolving);

      case "class": {
        if (!env.classTypes) {
          return error([
            errorAt(
              "MTH1006",
              `Interface cannot refer to class '${type.name}'`,
              location,
              "Interfaces are resolved before classes are inferred; list the methods instead"
            ),
          ]);
        }
        const classType = env.classTypes.get(type.name);
        if (!classType) {
          return error([
            errorAt("MTH2004", `Unknown class '${type.name}'`, location),
          ]);
        }
        return ok(classType);
      }

      case "intersection": {
        const operands = collectResults(
          type.types.map((t) => evaluate(t, location, resolving))
        );
        if (!operands.ok) return operands;
        return ok(operands.value.reduce(lattice.intersect, emptyMethodSet));
      }

      case "union": {
        const operands = collectResults(
          type.types.map((t) => evaluate(t, location, resolving))
        );
        if (!operands.ok) return operands;
        const [first, ...rest] = operands.value;
        // Non-empty by construction of the union expression
        return first ? ok(rest.reduce(lattice.unionType, first)) : ok(emptyMethodSet);
      }
    }
  };

  return {
    evaluate: (type, location) => evaluate(type, location, []),
    resolveAlias: (name, location) => resolveAlias(name, location, []),
    lattice,
  };
};

/**
 * Evaluate every alias once so broken ones are reported at declaration time
 */
export const validateAliases = (
  evaluator: TypeEvaluator,
  aliases: AliasTable
): readonly Diagnostic[] =>
  dedupeDiagnostics(
    [...aliases.values()].flatMap((alias) => {
      const result = evaluator.resolveAlias(alias.name, alias.location);
      return result.ok ? [] : result.error;
    })
  );

/**
 * Evaluate the parameter and return types of every signature. Types that
 * mention a class are left to the checking pass.
 */
export const validateSignatures = (
  evaluator: TypeEvaluator,
  signatures: readonly MethodSignature[]
): readonly Diagnostic[] =>
  dedupeDiagnostics(
    signatures.flatMap((signature) =>
      [
        ...signature.parameters.map((p) => p.type),
        ...(signature.returnType ? [signature.returnType] : []),
      ]
        .filter((type) => !referencesClass(type))
        .flatMap((type) => {
          const result = evaluator.evaluate(type, signature.location);
          return result.ok ? [] : result.error;
        })
    )
  );

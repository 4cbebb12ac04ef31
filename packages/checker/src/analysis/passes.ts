/**
 * Analysis passes.
 *
 * Each pass reads what the previous one produced and nothing else mutable:
 * declarations -> (freeze) -> inference -> checking. Units inside a pass
 * (one declaration, one class, one site) are independent of each other.
 */

import {
  createFirstReportFilter,
  dedupeDiagnostics,
  errorAt,
  type Diagnostic,
} from "../types/diagnostic.js";
import type { MethodSetType } from "../types/method-set.js";
import type { ProgramInput } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import {
  createMethodRegistry,
  declareMethod,
  freezeRegistry,
  type FrozenMethodRegistry,
  type MethodRegistry,
} from "../registry/index.js";
import {
  createAliasTable,
  createTypeEvaluator,
  defineAlias,
  validateAliases,
  validateSignatures,
  type AliasTable,
} from "../lattice/index.js";
import {
  createClassTable,
  createInferenceEngine,
  defineClass,
  getClassTypes,
  type ClassTable,
} from "../inference/index.js";
import {
  checkSite,
  verifyDeclaredInterfaces,
  type SiteReport,
} from "../checker/index.js";

export type DeclaredProgram = {
  readonly registry: FrozenMethodRegistry;
  readonly aliases: AliasTable;
};

export type InferredProgram = DeclaredProgram & {
  readonly classes: ClassTable;
  readonly classTypes: ReadonlyMap<string, MethodSetType>;
};

export type CheckedProgram = InferredProgram & {
  readonly sites: readonly SiteReport[];
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Declare every method and alias, then freeze. Every declaration error is
 * collected before the pass reports failure.
 */
export const runDeclarationPass = (
  program: ProgramInput
): Result<DeclaredProgram, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];

  const registry = program.methods.reduce<MethodRegistry>((acc, signature) => {
    const result = declareMethod(acc, signature);
    if (!result.ok) {
      diagnostics.push(result.error);
      return acc;
    }
    return result.value;
  }, createMethodRegistry());

  const aliases = program.interfaces.reduce<AliasTable>((acc, alias) => {
    const result = defineAlias(acc, alias);
    if (!result.ok) {
      diagnostics.push(result.error);
      return acc;
    }
    return result.value;
  }, createAliasTable());

  const frozen = freezeRegistry(registry);
  const evaluator = createTypeEvaluator({ registry: frozen, aliases });
  diagnostics.push(
    ...dedupeDiagnostics([
      ...validateAliases(evaluator, aliases),
      ...validateSignatures(evaluator, program.methods),
    ])
  );

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }
  return ok({ registry: frozen, aliases });
};

/**
 * Infer every class against the frozen registry. A failing class does not
 * stop the others from being inferred, but any failure fails the pass.
 */
export const runInferencePass = (
  declared: DeclaredProgram,
  program: ProgramInput
): Result<InferredProgram, readonly Diagnostic[]> => {
  const engine = createInferenceEngine(declared.registry);
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();

  const classes = program.classes.reduce<ClassTable>((table, definition) => {
    if (seen.has(definition.name)) {
      diagnostics.push(
        errorAt(
          "MTH2003",
          `Class '${definition.name}' is defined more than once`,
          definition.location
        )
      );
      return table;
    }
    seen.add(definition.name);

    const result = defineClass(table, engine, definition);
    if (!result.ok) {
      diagnostics.push(...result.error);
      return table;
    }
    return result.value;
  }, createClassTable());

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }
  return ok({ ...declared, classes, classTypes: getClassTypes(classes) });
};

/**
 * Verify declared interfaces and check every site. Satisfaction errors are
 * collected across the whole program; the pass itself never aborts.
 */
export const runCheckingPass = (
  inferred: InferredProgram,
  program: ProgramInput
): CheckedProgram => {
  const evaluator = createTypeEvaluator({
    registry: inferred.registry,
    aliases: inferred.aliases,
    classTypes: inferred.classTypes,
  });

  const interfaceDiagnostics = [...inferred.classes.entries.values()].flatMap(
    (entry) =>
      verifyDeclaredInterfaces(evaluator, entry.definition, entry.methodSet)
  );

  const sites = program.sites.map((site) =>
    checkSite({ registry: inferred.registry, evaluator }, site)
  );

  // A broken signature type is reported once, however many sites use it.
  // Everything else is reported per site.
  const firstReport = createFirstReportFilter();

  return {
    ...inferred,
    sites,
    diagnostics: [
      ...interfaceDiagnostics,
      ...sites.flatMap((site) => [
        ...site.unresolved,
        ...site.signatureErrors.filter(firstReport),
        ...site.verdicts.flatMap((v) =>
          v.state === "failed" ? [v.diagnostic] : []
        ),
      ]),
    ],
  };
};

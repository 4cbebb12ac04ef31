/**
 * Method registry creation and declaration
 */

import { errorAt, type Diagnostic } from "../types/diagnostic.js";
import type { MethodSignature } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import type { FrozenMethodRegistry, MethodRegistry } from "./types.js";
import { formatSignature, signaturesEqual, unqualifiedName } from "./queries.js";

/**
 * Create an empty, unfrozen registry
 */
export const createMethodRegistry = (): MethodRegistry => ({
  signatures: new Map(),
  byUnqualifiedName: new Map(),
  frozen: false,
});

/**
 * Declare a method (immutable). Redeclaring an identical signature returns
 * the registry unchanged; a different signature under the same name fails.
 */
export const declareMethod = (
  registry: MethodRegistry,
  signature: MethodSignature
): Result<MethodRegistry, Diagnostic> => {
  const existing = registry.signatures.get(signature.name);
  if (existing) {
    if (signaturesEqual(existing, signature)) {
      return ok(registry);
    }
    return error(
      errorAt(
        "MTH1001",
        `Method '${signature.name}' is already declared as ${formatSignature(existing)}, cannot redeclare it as ${formatSignature(signature)}`,
        signature.location,
        existing.location
          ? `First declared at ${existing.location.file}:${existing.location.line}`
          : undefined
      )
    );
  }

  if (registry.frozen) {
    // Declarations close at the barrier; a late declaration is a pipeline bug
    return error(
      errorAt(
        "MTH1007",
        `Method '${signature.name}' declared after the registry was frozen`,
        signature.location
      )
    );
  }

  const signatures = new Map(registry.signatures);
  signatures.set(signature.name, signature);

  const key = unqualifiedName(signature.name);
  const byUnqualifiedName = new Map(registry.byUnqualifiedName);
  byUnqualifiedName.set(key, [
    ...(registry.byUnqualifiedName.get(key) ?? []),
    signature.name,
  ]);

  return ok({ signatures, byUnqualifiedName, frozen: false });
};

/**
 * Close the declaration pass
 */
export const freezeRegistry = (
  registry: MethodRegistry
): FrozenMethodRegistry => ({
  signatures: registry.signatures,
  byUnqualifiedName: registry.byUnqualifiedName,
  frozen: true,
});

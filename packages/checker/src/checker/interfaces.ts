/**
 * Declared interface verification.
 *
 * A class may list the interfaces it means to implement. The list is
 * checked against the inferred method-set here, statically; nothing about
 * it survives to run time.
 */

import {
  createDiagnostic,
  type Diagnostic,
} from "../types/diagnostic.js";
import { formatMethodNames, type MethodSetType } from "../types/method-set.js";
import type { ClassDefinition } from "../types/program.js";
import { formatTypeExpression } from "../types/type-expression.js";
import { missingMethods, type TypeEvaluator } from "../lattice/index.js";

export const verifyDeclaredInterfaces = (
  evaluator: TypeEvaluator,
  definition: ClassDefinition,
  inferred: MethodSetType
): readonly Diagnostic[] =>
  (definition.interfaces ?? []).flatMap((declared) => {
    const required = evaluator.evaluate(declared, definition.location);
    if (!required.ok) {
      return required.error;
    }

    const missing = missingMethods(inferred, required.value);
    if (missing.length === 0) {
      return [];
    }

    return [
      createDiagnostic(
        "MTH3001",
        "error",
        `Class '${definition.name}' declares ${formatTypeExpression(declared)} but does not implement ${formatMethodNames(missing)}`,
        definition.location,
        `Implement ${missing.map((m) => `'${m}'`).join(", ")} or remove the interface from the declaration`,
        missing
      ),
    ];
  });

/**
 * Method registry queries
 */

import { errorAt, type Diagnostic, type SourceLocation } from "../types/diagnostic.js";
import type { MethodSignature } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import {
  formatTypeExpression,
  typeExpressionsEqual,
} from "../types/type-expression.js";
import type { MethodRegistry } from "./types.js";

/**
 * `io.close` -> `close`
 */
export const unqualifiedName = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? name : name.slice(dot + 1);
};

/**
 * `io.stream.close` -> `io.stream`; undefined for unqualified names
 */
export const qualifierOf = (name: string): string | undefined => {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? undefined : name.slice(0, dot);
};

export const isQualified = (name: string): boolean => name.includes(".");

/**
 * Look up a declared method
 */
export const lookupMethod = (
  registry: MethodRegistry,
  name: string,
  location?: SourceLocation
): Result<MethodSignature, Diagnostic> => {
  const signature = registry.signatures.get(name);
  if (!signature) {
    return error(
      errorAt("MTH1002", `Unknown method '${name}'`, location)
    );
  }
  return ok(signature);
};

export const hasMethod = (registry: MethodRegistry, name: string): boolean =>
  registry.signatures.has(name);

/**
 * Every declared qualified name, sorted
 */
export const getDeclaredNames = (
  registry: MethodRegistry
): readonly string[] => [...registry.signatures.keys()].sort();

/**
 * Declared methods sharing an unqualified name, in declaration order
 */
export const findByUnqualifiedName = (
  registry: MethodRegistry,
  name: string
): readonly string[] => registry.byUnqualifiedName.get(name) ?? [];

/**
 * Two signatures are equal when their parameter and return types are;
 * parameter names and locations do not count.
 */
export const signaturesEqual = (
  a: MethodSignature,
  b: MethodSignature
): boolean => {
  if (a.name !== b.name) return false;
  if (a.parameters.length !== b.parameters.length) return false;

  const paramsEqual = a.parameters.every((param, i) => {
    const other = b.parameters[i];
    return other !== undefined && typeExpressionsEqual(param.type, other.type);
  });
  if (!paramsEqual) return false;

  if (a.returnType === undefined || b.returnType === undefined) {
    return a.returnType === b.returnType;
  }
  return typeExpressionsEqual(a.returnType, b.returnType);
};

/**
 * Render a signature for messages, e.g. `close(target: {isOpen}): {close}`
 */
export const formatSignature = (signature: MethodSignature): string => {
  const params = signature.parameters
    .map(
      (p, i) => `${p.name ?? `arg${i + 1}`}: ${formatTypeExpression(p.type)}`
    )
    .join(", ");
  const returns = signature.returnType
    ? `: ${formatTypeExpression(signature.returnType)}`
    : "";
  return `${signature.name}(${params})${returns}`;
};

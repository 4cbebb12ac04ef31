/**
 * TypeExpression constructors and structural helpers
 */

import type { TypeExpression } from "./program.js";

export const methodsType = (...names: string[]): TypeExpression => ({
  kind: "methods",
  names,
});

export const aliasType = (name: string): TypeExpression => ({
  kind: "alias",
  name,
});

export const classType = (name: string): TypeExpression => ({
  kind: "class",
  name,
});

export const intersectionOf = (
  ...types: readonly TypeExpression[]
): TypeExpression => ({
  kind: "intersection",
  types,
});

export const unionOf = (
  first: TypeExpression,
  ...rest: readonly TypeExpression[]
): TypeExpression => ({
  kind: "union",
  types: [first, ...rest],
});

/**
 * Render a type expression in source-like notation. Method names inside a
 * set are sorted, so the output doubles as a canonical form.
 */
export const formatTypeExpression = (type: TypeExpression): string => {
  switch (type.kind) {
    case "methods":
      return `{${[...new Set(type.names)].sort().join(", ")}}`;
    case "alias":
      return type.name;
    case "class":
      return `typeof ${type.name}`;
    case "intersection":
      return type.types.length === 0
        ? "{}"
        : type.types.map(formatOperand).join(" & ");
    case "union":
      return type.types.map(formatOperand).join(" | ");
  }
};

const formatOperand = (type: TypeExpression): string =>
  type.kind === "intersection" || type.kind === "union"
    ? `(${formatTypeExpression(type)})`
    : formatTypeExpression(type);

export const typeExpressionsEqual = (
  a: TypeExpression,
  b: TypeExpression
): boolean => formatTypeExpression(a) === formatTypeExpression(b);

/**
 * Whether a type mentions a class, directly or inside an operator. Such a
 * type can only be evaluated once classes are inferred.
 */
export const referencesClass = (type: TypeExpression): boolean => {
  switch (type.kind) {
    case "class":
      return true;
    case "intersection":
    case "union":
      return type.types.some(referencesClass);
    case "methods":
    case "alias":
      return false;
  }
};

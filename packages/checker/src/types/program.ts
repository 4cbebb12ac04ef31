/**
 * Program representation handed to the checker.
 *
 * A front end parses source text and reduces it to these records: method
 * declarations, interface aliases, class bodies (as the method names they
 * implement) and the call, return and assignment sites to check.
 */

import type { SourceLocation } from "./diagnostic.js";

/**
 * Static type notation used at parameter, return, assignment and
 * declared-interface positions.
 */
export type TypeExpression =
  | { readonly kind: "methods"; readonly names: readonly string[] }
  | { readonly kind: "alias"; readonly name: string }
  | { readonly kind: "class"; readonly name: string }
  | {
      readonly kind: "intersection";
      readonly types: readonly TypeExpression[];
    }
  | {
      readonly kind: "union";
      readonly types: readonly [TypeExpression, ...TypeExpression[]];
    };

export type ParameterDeclaration = {
  readonly name?: string;
  readonly type: TypeExpression;
};

export type MethodSignature = {
  /** Qualified name, e.g. `close` or `io.close` */
  readonly name: string;
  readonly parameters: readonly ParameterDeclaration[];
  /** Absent when the method returns nothing */
  readonly returnType?: TypeExpression;
  readonly location?: SourceLocation;
};

export type InterfaceAlias = {
  readonly name: string;
  readonly type: TypeExpression;
  readonly location?: SourceLocation;
};

export type MethodImplementation = {
  /** Method reference as written in the class body; may be qualified */
  readonly name: string;
  readonly location?: SourceLocation;
};

export type MethodImport = {
  readonly qualifiedName: string;
  /** Local name the implementation is known by inside the class */
  readonly alias?: string;
  readonly location?: SourceLocation;
};

export type ClassDefinition = {
  readonly name: string;
  readonly methods: readonly MethodImplementation[];
  readonly imports?: readonly MethodImport[];
  /** Optional explicit interface list, verified statically */
  readonly interfaces?: readonly TypeExpression[];
  readonly location?: SourceLocation;
};

export type CallSite = {
  readonly kind: "call";
  readonly method: string;
  readonly arguments: readonly TypeExpression[];
  readonly location?: SourceLocation;
};

export type ReturnSite = {
  readonly kind: "return";
  /** Method whose declared return type the value must satisfy */
  readonly method: string;
  readonly value: TypeExpression;
  readonly location?: SourceLocation;
};

export type AssignmentSite = {
  readonly kind: "assignment";
  readonly variable?: string;
  readonly declaredType: TypeExpression;
  readonly value: TypeExpression;
  readonly location?: SourceLocation;
};

export type CheckSite = CallSite | ReturnSite | AssignmentSite;

export type ProgramInput = {
  readonly methods: readonly MethodSignature[];
  readonly interfaces: readonly InterfaceAlias[];
  readonly classes: readonly ClassDefinition[];
  readonly sites: readonly CheckSite[];
};

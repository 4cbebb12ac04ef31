/**
 * Method registry type definitions
 */

import type { MethodSignature } from "../types/program.js";

export type MethodRegistry = {
  readonly signatures: ReadonlyMap<string, MethodSignature>; // Qualified name to signature
  readonly byUnqualifiedName: ReadonlyMap<string, readonly string[]>; // Last name segment to qualified names
  readonly frozen: boolean;
};

/**
 * A registry past the declaration barrier. Inference and checking only
 * accept this type, so they can never observe a half-populated table.
 */
export type FrozenMethodRegistry = MethodRegistry & { readonly frozen: true };

/**
 * Interface alias table.
 *
 * An alias only names a type expression; it never adds a node to the
 * lattice, so resolving one yields exactly the set it abbreviates.
 */

import { errorAt, type Diagnostic } from "../types/diagnostic.js";
import type { InterfaceAlias } from "../types/program.js";
import { ok, error, type Result } from "../types/result.js";
import {
  formatTypeExpression,
  typeExpressionsEqual,
} from "../types/type-expression.js";

export type AliasTable = ReadonlyMap<string, InterfaceAlias>;

export const createAliasTable = (): AliasTable => new Map();

export const defineAlias = (
  table: AliasTable,
  alias: InterfaceAlias
): Result<AliasTable, Diagnostic> => {
  const existing = table.get(alias.name);
  if (existing) {
    if (typeExpressionsEqual(existing.type, alias.type)) {
      return ok(table);
    }
    return error(
      errorAt(
        "MTH1003",
        `Interface '${alias.name}' is already defined as ${formatTypeExpression(existing.type)}, cannot redefine it as ${formatTypeExpression(alias.type)}`,
        alias.location
      )
    );
  }

  const next = new Map(table);
  next.set(alias.name, alias);
  return ok(next);
};

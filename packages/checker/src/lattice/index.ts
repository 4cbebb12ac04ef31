/**
 * Type lattice - Public API
 */

export {
  intersect,
  unionType,
  intersectAll,
  unionAll,
  satisfies,
  missingMethods,
  createLatticeCache,
  type LatticeCache,
} from "./operations.js";
export { createAliasTable, defineAlias, type AliasTable } from "./aliases.js";
export {
  createTypeEvaluator,
  validateAliases,
  validateSignatures,
  type TypeEnvironment,
  type TypeEvaluator,
  type EvaluationResult,
} from "./evaluate.js";

/**
 * Method registry - Public API
 */

export type { MethodRegistry, FrozenMethodRegistry } from "./types.js";
export {
  createMethodRegistry,
  declareMethod,
  freezeRegistry,
} from "./creation.js";
export {
  lookupMethod,
  hasMethod,
  getDeclaredNames,
  findByUnqualifiedName,
  unqualifiedName,
  qualifierOf,
  isQualified,
  signaturesEqual,
  formatSignature,
} from "./queries.js";

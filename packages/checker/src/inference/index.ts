/**
 * Method-set inference - Public API
 */

export { resolveMethodReference, importLocalName } from "./resolution.js";
export {
  inferMethodSet,
  createInferenceEngine,
  type InferenceEngine,
  type InferenceResult,
} from "./infer.js";
export {
  createClassTable,
  defineClass,
  getClassType,
  getClassTypes,
  type ClassTable,
  type ClassEntry,
} from "./class-table.js";

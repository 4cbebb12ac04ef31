/**
 * Program loading - Public API
 */

export { loadProgramFile, parseProgram } from "./program-loader.js";

/**
 * Program loading for the commands
 */

import {
  formatDiagnostic,
  loadProgramFile,
  type ProgramInput,
} from "@methodical/checker";
import type { Result } from "../types.js";

export const loadProgram = (
  programPath: string
): Result<ProgramInput, string> => {
  const loaded = loadProgramFile(programPath);
  if (!loaded.ok) {
    return {
      ok: false,
      error: loaded.error.map(formatDiagnostic).join("\n"),
    };
  }
  return loaded;
};

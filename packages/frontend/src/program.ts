/**
 * TypeScript program creation and management
 * Main dispatcher - re-exports from program/ subdirectory
 */

export type { ProgramOptions, LintProgram } from "./program/index.js";
export {
  createProgram,
  getSourceFile,
  isTrustedFile,
  collectTsDiagnostics,
} from "./program/index.js";

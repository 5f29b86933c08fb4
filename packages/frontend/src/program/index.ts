/**
 * Program - Public API
 */

export type { ProgramOptions, LintProgram } from "./types.js";
export { defaultTsConfig } from "./config.js";
export {
  collectTsDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
} from "./diagnostics.js";
export { createProgram } from "./creation.js";
export { getSourceFile, isTrustedFile } from "./queries.js";

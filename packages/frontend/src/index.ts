/**
 * chronolint frontend - temporal conversion checks over TypeScript programs
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type CodeFix,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  filterDiagnostics,
  countBySeverity,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./temporal/index.js";
export * from "./program.js";
export * from "./validator.js";
export * from "./rules.js";
export * from "./fixes/index.js";

import { createProgram, type ProgramOptions, type LintProgram } from "./program.js";
import { type ValidationOptions, validateProgram } from "./validator.js";
import type { DiagnosticsCollector } from "./types/diagnostic.js";
import { type Result, map } from "./types/result.js";

export type LintResult = {
  readonly program: LintProgram;
  readonly diagnostics: DiagnosticsCollector;
};

/**
 * Main entry point: build the program and run every enabled rule
 */
export const lint = (
  options: ProgramOptions & ValidationOptions
): Result<LintResult, DiagnosticsCollector> =>
  map(createProgram(options), (program) => ({
    program,
    diagnostics: validateProgram(program, options),
  }));

/**
 * Program type definitions
 */

import type * as ts from "typescript";
import type { TemporalLibrary } from "../temporal/libraries.js";
import type { DiagnosticsCollector } from "../types/diagnostic.js";

export type ProgramOptions = {
  readonly projectRoot: string;
  /** tsconfig.json to read; when absent, `files` are compiled with defaults */
  readonly tsconfig?: string;
  /** Narrow the checked files (absolute or projectRoot-relative) */
  readonly files?: readonly string[];
  readonly libraries?: readonly TemporalLibrary[];
  /** projectRoot-relative prefixes exempt from the rules */
  readonly trustedPaths?: readonly string[];
  readonly verbose?: boolean;
};

export type LintProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly options: ProgramOptions;
  readonly libraries: readonly TemporalLibrary[];
  /** Project files to check (declaration files excluded) */
  readonly sourceFiles: readonly ts.SourceFile[];
  /** Type errors of the analysed code; reported, never fatal */
  readonly typeDiagnostics: DiagnosticsCollector;
};

/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { type Result, ok, error } from "../types/result.js";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { DEFAULT_TEMPORAL_LIBRARIES } from "../temporal/libraries.js";
import type { LintProgram, ProgramOptions } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectTsDiagnostics, convertTsDiagnostic } from "./diagnostics.js";

type ProgramInput = {
  readonly rootNames: readonly string[];
  readonly compilerOptions: ts.CompilerOptions;
  readonly projectReferences?: readonly ts.ProjectReference[];
};

const failWith = (
  diagnostics: readonly ts.Diagnostic[],
  code: "CHR9002" | "CHR9003"
): DiagnosticsCollector =>
  diagnostics.reduce((collector, tsDiag) => {
    const diagnostic = convertTsDiagnostic(tsDiag, code);
    return diagnostic ? addDiagnostic(collector, diagnostic) : collector;
  }, createDiagnosticsCollector());

/**
 * Read and parse a tsconfig.json into root files and compiler options
 */
const readTsConfig = (
  configPath: string
): Result<ProgramInput, DiagnosticsCollector> => {
  if (!fs.existsSync(configPath)) {
    return error(
      addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic(
          "CHR9001",
          "error",
          `tsconfig file not found: ${configPath}`,
          undefined,
          "Pass --project or set 'tsconfig' in chronolint.json"
        )
      )
    );
  }

  const { config, error: readError } = ts.readConfigFile(
    configPath,
    ts.sys.readFile
  );
  if (readError) {
    return error(failWith([readError], "CHR9002"));
  }

  const parsed = ts.parseJsonConfigFileContent(
    config,
    ts.sys,
    path.dirname(configPath),
    undefined,
    configPath
  );
  // "No inputs were found" still leaves a usable (empty) program
  const fatal = parsed.errors.filter(
    (diag) =>
      diag.category === ts.DiagnosticCategory.Error && diag.code !== 18003
  );
  if (fatal.length > 0) {
    return error(failWith(fatal, "CHR9003"));
  }

  return ok({
    rootNames: parsed.fileNames,
    compilerOptions: { ...parsed.options, noEmit: true },
    projectReferences: parsed.projectReferences,
  });
};

/**
 * Create a lint program from a tsconfig.json or a list of files
 */
export const createProgram = (
  options: ProgramOptions
): Result<LintProgram, DiagnosticsCollector> => {
  const resolveInProject = (fileName: string): string =>
    path.resolve(options.projectRoot, fileName);

  const explicitFiles = options.files?.map(resolveInProject);

  const inputResult: Result<ProgramInput, DiagnosticsCollector> =
    options.tsconfig !== undefined
      ? readTsConfig(resolveInProject(options.tsconfig))
      : ok({
          rootNames: explicitFiles ?? [],
          compilerOptions: defaultTsConfig,
        });

  if (!inputResult.ok) {
    return inputResult;
  }

  const input = inputResult.value;
  // Explicit files are checked even when the tsconfig does not include them
  const rootNames =
    options.tsconfig !== undefined && explicitFiles !== undefined
      ? [...new Set([...input.rootNames, ...explicitFiles])]
      : input.rootNames;

  if (options.verbose) {
    console.log(
      options.tsconfig !== undefined
        ? `tsconfig: ${resolveInProject(options.tsconfig)}`
        : "tsconfig: (none, using defaults)"
    );
    console.log(`Root files: ${rootNames.length}`);
  }

  const program = ts.createProgram({
    rootNames,
    options: input.compilerOptions,
    projectReferences: input.projectReferences,
  });

  // TypeScript reports file names with forward slashes
  const normalize = (fileName: string): string =>
    path.resolve(fileName).split(path.sep).join("/");
  const roots = new Set(rootNames.map(normalize));
  const narrowTo =
    explicitFiles !== undefined
      ? new Set(explicitFiles.map(normalize))
      : roots;

  const sourceFiles = program
    .getSourceFiles()
    .filter(
      (sf) =>
        !sf.isDeclarationFile &&
        roots.has(normalize(sf.fileName)) &&
        narrowTo.has(normalize(sf.fileName))
    );

  const typeDiagnostics = collectTsDiagnostics(program);

  if (options.verbose) {
    console.log(`Checking ${sourceFiles.length} source file(s)`);
    console.log(
      `TypeScript reported ${typeDiagnostics.diagnostics.length} diagnostic(s)`
    );
  }

  return ok({
    program,
    checker: program.getTypeChecker(),
    options,
    libraries: options.libraries ?? DEFAULT_TEMPORAL_LIBRARIES,
    sourceFiles,
    typeDiagnostics,
  });
};

/**
 * Test harness for the temporal rules.
 * Creates a real TypeScript program over a temporary project that has the
 * temporal-kit fixture installed, and returns it as a LintProgram.
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as os from "node:os";
import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import type { LintProgram } from "../program.js";
import { collectTsDiagnostics } from "../program/diagnostics.js";
import type { TemporalLibrary } from "../temporal/libraries.js";
import {
  EXTRA_TEMPORAL_TYPE_TAGS,
  PRIMARY_TEMPORAL_TYPE_TAGS,
} from "../temporal/tags.js";

const FIXTURES_DIR = fileURLToPath(
  new URL("../../test/fixtures/", import.meta.url)
);

export const TEST_LIBRARIES: readonly TemporalLibrary[] = [
  {
    name: "temporal-kit",
    modules: ["temporal-kit"],
    types: PRIMARY_TEMPORAL_TYPE_TAGS,
    accessorType: "TemporalAccessor",
  },
  {
    name: "temporal-kit-extra",
    modules: ["temporal-kit-extra"],
    types: EXTRA_TEMPORAL_TYPE_TAGS,
  },
];

export type TestProgramOptions = {
  /** projectRoot-relative path of the file under test */
  readonly fileName?: string;
  /** More project files, keyed by projectRoot-relative path */
  readonly extraFiles?: Readonly<Record<string, string>>;
  readonly trustedPaths?: readonly string[];
};

export type TestProgram = LintProgram & {
  readonly sourceFile: ts.SourceFile;
  readonly fileAt: (relativePath: string) => ts.SourceFile;
  readonly cleanup: () => void;
};

/**
 * Create a program checking `source`. Callers must call `cleanup()`.
 */
export const createTestProgram = (
  source: string,
  options: TestProgramOptions = {}
): TestProgram => {
  const projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), "chronolint-"));

  fs.cpSync(
    path.join(FIXTURES_DIR, "temporal-kit"),
    path.join(projectRoot, "node_modules", "temporal-kit"),
    { recursive: true }
  );
  const extraDeclarations = path.join(projectRoot, "types", "extra.d.ts");
  fs.mkdirSync(path.dirname(extraDeclarations), { recursive: true });
  fs.copyFileSync(
    path.join(FIXTURES_DIR, "temporal-kit-extra.d.ts"),
    extraDeclarations
  );

  const files: Record<string, string> = {
    ...options.extraFiles,
    [options.fileName ?? "src/main.ts"]: source,
  };
  const rootNames = Object.entries(files).map(([relativePath, text]) => {
    const filePath = path.join(projectRoot, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text);
    return filePath;
  });

  const compilerOptions: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.CommonJS,
    moduleResolution: ts.ModuleResolutionKind.Node10,
    strict: true,
    noEmit: true,
    skipLibCheck: true,
    types: [],
  };

  const program = ts.createProgram(
    [...rootNames, extraDeclarations],
    compilerOptions
  );

  const fileAt = (relativePath: string): ts.SourceFile => {
    const sourceFile = program.getSourceFile(
      path.join(projectRoot, relativePath)
    );
    if (!sourceFile) {
      throw new Error(`Test file not in program: ${relativePath}`);
    }
    return sourceFile;
  };

  const sourceFile = fileAt(options.fileName ?? "src/main.ts");

  return {
    program,
    checker: program.getTypeChecker(),
    options: {
      projectRoot,
      libraries: TEST_LIBRARIES,
      trustedPaths: options.trustedPaths,
    },
    libraries: TEST_LIBRARIES,
    sourceFiles: [sourceFile],
    typeDiagnostics: collectTsDiagnostics(program),
    sourceFile,
    fileAt,
    cleanup: () => fs.rmSync(projectRoot, { recursive: true, force: true }),
  };
};

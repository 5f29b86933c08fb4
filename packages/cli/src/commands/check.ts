/**
 * chronolint check command - Lint a project's temporal conversions
 */

import { writeFileSync } from "node:fs";
import { relative } from "node:path";
import {
  type Diagnostic,
  type Result,
  addDiagnostic,
  applyFixes,
  countBySeverity,
  createDiagnosticsCollector,
  error,
  formatDiagnostic,
  lint,
  ok,
} from "@chronolint/frontend";
import type { ResolvedConfig } from "../types.js";

export type CheckSummary = {
  readonly filesChecked: number;
  readonly errors: number;
  readonly warnings: number;
  readonly infos: number;
  readonly fixesApplied: number;
};

export type CheckFailure =
  | { readonly kind: "program"; readonly diagnostics: readonly Diagnostic[] }
  | { readonly kind: "fix"; readonly message: string };

/**
 * Rewrite a diagnostic's file as a project-relative path
 */
const relativeTo = (
  projectRoot: string,
  diagnostic: Diagnostic
): Diagnostic =>
  diagnostic.location
    ? {
        ...diagnostic,
        location: {
          ...diagnostic.location,
          file: relative(projectRoot, diagnostic.location.file),
        },
      }
    : diagnostic;

type FileFixes = {
  readonly file: string;
  readonly modified: string;
};

/**
 * Apply every fix, file by file; nothing is written unless all files succeed.
 * Diagnostics left in a fixed file are moved to their place in the new text.
 */
const fixFiles = (
  config: ResolvedConfig,
  diagnostics: readonly Diagnostic[],
  readSource: (file: string) => string | undefined
): Result<
  { readonly remaining: readonly Diagnostic[]; readonly applied: number },
  CheckFailure
> => {
  const byFile = new Map<string, Diagnostic[]>();
  const remaining: Diagnostic[] = [];

  for (const diagnostic of diagnostics) {
    const file = diagnostic.location?.file;
    if (file !== undefined) {
      byFile.set(file, [...(byFile.get(file) ?? []), diagnostic]);
    } else {
      remaining.push(diagnostic);
    }
  }

  const writes: FileFixes[] = [];
  let applied = 0;

  for (const [file, fileDiagnostics] of byFile) {
    const source = readSource(file);
    if (source === undefined) {
      remaining.push(...fileDiagnostics);
      continue;
    }

    const result = applyFixes(
      source,
      fileDiagnostics,
      relative(config.projectRoot, file)
    );
    if (!result.ok) {
      return error({ kind: "fix", message: result.error });
    }

    if (config.verbose) {
      for (const skipped of result.value.skippedReasons) {
        console.log(
          `Skipped ${skipped.code} fix in ${file}: ${skipped.reason}`
        );
      }
    }
    remaining.push(...result.value.remaining);
    applied += result.value.applied;
    if (result.value.applied > 0) {
      writes.push({ file, modified: result.value.modified });
    }
  }

  for (const write of writes) {
    writeFileSync(write.file, write.modified, "utf-8");
  }

  return ok({ remaining, applied });
};

const printText = (
  config: ResolvedConfig,
  diagnostics: readonly Diagnostic[],
  summary: CheckSummary
): void => {
  for (const diagnostic of diagnostics) {
    console.log(formatDiagnostic(diagnostic));
  }

  if (config.quiet) {
    return;
  }

  if (summary.fixesApplied > 0) {
    console.log(`Applied ${summary.fixesApplied} fix(es)`);
  }
  console.log(
    `Checked ${summary.filesChecked} file(s): ${summary.errors} error(s), ${summary.warnings} warning(s), ${summary.infos} info`
  );
};

/**
 * Check the configured project
 */
export const checkCommand = (
  config: ResolvedConfig
): Result<CheckSummary, CheckFailure> => {
  const lintResult = lint({
    projectRoot: config.projectRoot,
    tsconfig: config.tsconfig,
    files: config.files,
    libraries: config.libraries,
    trustedPaths: config.trustedPaths,
    verbose: config.verbose,
    rules: config.rules,
  });

  if (!lintResult.ok) {
    return error({
      kind: "program",
      diagnostics: lintResult.error.diagnostics.map((d) =>
        relativeTo(config.projectRoot, d)
      ),
    });
  }

  const { program, diagnostics } = lintResult.value;

  if (config.verbose) {
    for (const diagnostic of program.typeDiagnostics.diagnostics) {
      console.log(
        formatDiagnostic(relativeTo(config.projectRoot, diagnostic))
      );
    }
  }

  let reported: readonly Diagnostic[] = diagnostics.diagnostics;
  let fixesApplied = 0;

  if (config.fix) {
    const fixResult = fixFiles(
      config,
      diagnostics.diagnostics,
      (file) => program.program.getSourceFile(file)?.text
    );
    if (!fixResult.ok) {
      return fixResult;
    }
    reported = fixResult.value.remaining;
    fixesApplied = fixResult.value.applied;
  }

  const counts = countBySeverity(
    reported.reduce(addDiagnostic, createDiagnosticsCollector())
  );
  const summary: CheckSummary = {
    filesChecked: program.sourceFiles.length,
    errors: counts.error,
    warnings: counts.warning,
    infos: counts.info,
    fixesApplied,
  };
  const shown = reported.map((d) => relativeTo(config.projectRoot, d));

  if (config.format === "json") {
    console.log(JSON.stringify({ diagnostics: shown, summary }, null, 2));
  } else {
    printText(config, shown, summary);
  }

  return ok(summary);
};

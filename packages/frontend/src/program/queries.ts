/**
 * Program query functions
 */

import * as ts from "typescript";
import * as path from "node:path";
import type { LintProgram } from "./types.js";

/**
 * Get a source file from the program by file path
 */
export const getSourceFile = (
  program: LintProgram,
  filePath: string
): ts.SourceFile | null => {
  const absolutePath = path.resolve(program.options.projectRoot, filePath);
  return program.program.getSourceFile(absolutePath) ?? null;
};

/**
 * True when a file lies under one of the trusted path prefixes
 */
export const isTrustedFile = (
  program: LintProgram,
  fileName: string
): boolean => {
  const relative = path
    .relative(program.options.projectRoot, fileName)
    .split(path.sep)
    .join("/");
  return (program.options.trustedPaths ?? []).some((prefix) => {
    const normalized = prefix.replace(/^\.\//, "").replace(/\/+$/, "");
    return relative === normalized || relative.startsWith(`${normalized}/`);
  });
};

/**
 * Validation orchestrator - runs every enabled rule over a program
 */

import * as ts from "typescript";
import type { LintProgram } from "../program.js";
import {
  type DiagnosticsCollector,
  createDiagnosticsCollector,
  filterDiagnostics,
  mergeDiagnostics,
} from "../types/diagnostic.js";
import { RULES, type RuleDefinition, type RuleLevel } from "../rules.js";
import { collectSuppressions, isSuppressed } from "./suppressions.js";

export type ValidationOptions = {
  /** Rule id -> level; rules not listed run at their default severity */
  readonly rules?: Readonly<Record<string, RuleLevel>>;
};

export const resolveRuleLevel = (
  rule: RuleDefinition,
  options: ValidationOptions
): RuleLevel => options.rules?.[rule.id] ?? rule.defaultSeverity;

/**
 * Validate an entire program
 */
export const validateProgram = (
  program: LintProgram,
  options: ValidationOptions = {}
): DiagnosticsCollector =>
  program.sourceFiles.reduce(
    (acc, sourceFile) => validateSourceFile(sourceFile, program, acc, options),
    createDiagnosticsCollector()
  );

/**
 * Validate a single source file
 */
export const validateSourceFile = (
  sourceFile: ts.SourceFile,
  program: LintProgram,
  collector: DiagnosticsCollector,
  options: ValidationOptions = {}
): DiagnosticsCollector =>
  RULES.reduce((acc, rule) => {
    const level = resolveRuleLevel(rule, options);
    if (level === "off") {
      return acc;
    }

    const found = rule.validate(
      sourceFile,
      program,
      createDiagnosticsCollector(),
      level
    );
    if (found.diagnostics.length === 0) {
      return acc;
    }

    const suppressions = collectSuppressions(sourceFile);
    return mergeDiagnostics(
      acc,
      filterDiagnostics(
        found,
        (diagnostic) => !isSuppressed(suppressions, diagnostic, rule.id)
      )
    );
  }, collector);

/**
 * FromTemporalAccessor validation
 *
 * Flags `Target.from(value)` calls over the temporal types that either:
 * - CHR1001: always throw, because the value's type cannot supply the
 *   fields the target needs (`LocalDate.from(month)`)
 * - CHR1002: always return the value itself (`Instant.from(instant)`)
 */

import * as ts from "typescript";
import type { LintProgram } from "../program.js";
import { isTrustedFile } from "../program/queries.js";
import {
  type CodeFix,
  type DiagnosticSeverity,
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";
import { evaluateFromCall } from "../temporal/evaluate.js";
import type { TemporalTypeTag } from "../temporal/tags.js";
import {
  type CallSiteContext,
  createCandidateCall,
  createTypeResolver,
  getFromCallee,
} from "./call-site.js";
import { getNodeLocation } from "./helpers.js";

const article = (tag: TemporalTypeTag): string =>
  /^[AEIOU]/.test(tag) ? "an" : "a";

/**
 * Expressions that keep their meaning wherever they are substituted
 */
const isSelfContained = (expression: ts.Expression): boolean =>
  ts.isIdentifier(expression) ||
  ts.isPropertyAccessExpression(expression) ||
  ts.isElementAccessExpression(expression) ||
  ts.isCallExpression(expression) ||
  // `new X` without arguments would take a following `.member` as its callee
  (ts.isNewExpression(expression) && expression.arguments !== undefined) ||
  ts.isParenthesizedExpression(expression) ||
  ts.isNonNullExpression(expression) ||
  ts.isTaggedTemplateExpression(expression) ||
  ts.isArrayLiteralExpression(expression) ||
  ts.isObjectLiteralExpression(expression) ||
  ts.isLiteralExpression(expression) ||
  ts.isTemplateExpression(expression) ||
  expression.kind === ts.SyntaxKind.ThisKeyword;

/**
 * Positions that accept any expression without re-association
 */
const acceptsAnyExpression = (call: ts.CallExpression): boolean => {
  const parent = call.parent;
  return (
    ts.isExpressionStatement(parent) ||
    ts.isParenthesizedExpression(parent) ||
    ts.isReturnStatement(parent) ||
    ts.isThrowStatement(parent) ||
    ts.isArrayLiteralExpression(parent) ||
    ts.isTemplateSpan(parent) ||
    ts.isSpreadElement(parent) ||
    ts.isExportAssignment(parent) ||
    (ts.isVariableDeclaration(parent) && parent.initializer === call) ||
    (ts.isPropertyAssignment(parent) && parent.initializer === call) ||
    (ts.isPropertyDeclaration(parent) && parent.initializer === call) ||
    (ts.isParameter(parent) && parent.initializer === call) ||
    (ts.isArrowFunction(parent) && parent.body === call) ||
    ((ts.isCallExpression(parent) || ts.isNewExpression(parent)) &&
      (parent.arguments?.some((argument) => argument === call) ?? false))
  );
};

const createRedundantCallFix = (
  call: ts.CallExpression,
  argument: ts.Expression,
  replacement: string,
  sourceFile: ts.SourceFile
): CodeFix => ({
  description: "Replace the call with its argument",
  start: call.getStart(sourceFile),
  end: call.getEnd(),
  replacement:
    isSelfContained(argument) || acceptsAnyExpression(call)
      ? replacement
      : `(${replacement})`,
});

/**
 * Validate `from(TemporalAccessor)` calls in a source file
 */
export const validateFromTemporalAccessor = (
  sourceFile: ts.SourceFile,
  program: LintProgram,
  collector: DiagnosticsCollector,
  severity: DiagnosticSeverity = "error"
): DiagnosticsCollector => {
  const context: CallSiteContext = {
    sourceFile,
    checker: program.checker,
    resolver: createTypeResolver(program.checker, program.libraries),
    libraries: program.libraries,
    isTrustedFile: (fileName) => isTrustedFile(program, fileName),
  };

  const visitor = (
    node: ts.Node,
    accCollector: DiagnosticsCollector
  ): DiagnosticsCollector => {
    let currentCollector = accCollector;

    if (ts.isCallExpression(node)) {
      const callee = getFromCallee(node);
      const argument = node.arguments[0];
      // Cheap syntactic filter before any type checker work
      const verdict =
        callee !== undefined && argument !== undefined
          ? evaluateFromCall(
              createCandidateCall(node, context),
              context.resolver
            )
          : undefined;

      if (verdict?.kind === "always-invalid") {
        currentCollector = addDiagnostic(
          currentCollector,
          createDiagnostic(
            "CHR1001",
            severity,
            `\`${verdict.target}.from(${verdict.source})\` always throws: ${article(verdict.source)} ${verdict.source} does not carry the fields ${article(verdict.target)} ${verdict.target} needs`,
            getNodeLocation(sourceFile, node),
            `Build the ${verdict.target} from a value that has all of its fields`
          )
        );
      }

      if (
        verdict?.kind === "always-redundant" &&
        callee !== undefined &&
        argument !== undefined
      ) {
        const fix = createRedundantCallFix(
          node,
          argument,
          verdict.replacement,
          sourceFile
        );
        currentCollector = addDiagnostic(
          currentCollector,
          createDiagnostic(
            "CHR1002",
            severity,
            `\`${callee.expression.getText(sourceFile)}.from()\` returns its argument unchanged`,
            getNodeLocation(sourceFile, node),
            `Use \`${fix.replacement}\` directly`,
            fix
          )
        );
      }
    }

    ts.forEachChild(node, (child) => {
      currentCollector = visitor(child, currentCollector);
    });

    return currentCollector;
  };

  return visitor(sourceFile, collector);
};

/**
 * Fix application
 *
 * Applies the fixes attached to diagnostics of one file. Fixes are applied
 * from the end of the file backwards so earlier offsets stay valid; a fix
 * overlapping one already kept is skipped.
 */

import * as ts from "typescript";
import type {
  CodeFix,
  Diagnostic,
  DiagnosticCode,
  SourceLocation,
} from "../types/diagnostic.js";
import { type Result, ok, error } from "../types/result.js";

export type SkippedFix = {
  readonly code: DiagnosticCode;
  readonly reason: string;
};

export type ApplyResult = {
  readonly modified: string;
  readonly applied: number;
  readonly skipped: number;
  readonly skippedReasons: readonly SkippedFix[];
  /**
   * Diagnostics whose fix was not applied, positioned in `modified`. One
   * inside replaced text that cannot be found again loses its location.
   */
  readonly remaining: readonly Diagnostic[];
};

type ApplicableFix = CodeFix & {
  readonly code: DiagnosticCode;
  readonly diagnostic: Diagnostic;
};

const rangesOverlap = (a: ApplicableFix, b: ApplicableFix): boolean =>
  a.start < b.end && a.end > b.start;

const countSyntaxErrors = (text: string, fileName: string): number =>
  (
    ts.transpileModule(text, {
      fileName,
      reportDiagnostics: true,
      compilerOptions: { target: ts.ScriptTarget.ES2022 },
    }).diagnostics ?? []
  ).filter((diag) => diag.category === ts.DiagnosticCategory.Error).length;

type Span = {
  readonly start: number;
  readonly end: number;
};

/**
 * Where [start, end) of the source lands once `kept` are applied
 */
const mapSpan = (
  source: string,
  kept: readonly ApplicableFix[],
  span: Span
): Span | undefined => {
  let shift = 0;
  let container: ApplicableFix | undefined;

  for (const fix of kept) {
    if (fix.end <= span.start) {
      shift += fix.replacement.length - (fix.end - fix.start);
    } else if (fix.start <= span.start && span.end <= fix.end) {
      container = fix;
    } else if (fix.start < span.end) {
      return undefined;
    }
  }

  if (container === undefined) {
    return { start: span.start + shift, end: span.end + shift };
  }

  // The replaced text survives inside the replacement (a nested call)
  const text = source.slice(span.start, span.end);
  const index = container.replacement.indexOf(text);
  if (index < 0 || index !== container.replacement.lastIndexOf(text)) {
    return undefined;
  }
  const start = container.start + shift + index;
  return { start, end: start + text.length };
};

type LineStarts = {
  readonly before: readonly number[];
  readonly after: readonly number[];
};

const lineStartsOf = (text: string, fileName: string): readonly number[] =>
  ts
    .createSourceFile(fileName, text, ts.ScriptTarget.Latest)
    .getLineStarts();

const offsetOf = (
  lineStarts: readonly number[],
  location: SourceLocation
): number | undefined => {
  const lineStart: number | undefined = lineStarts[location.line - 1];
  return lineStart === undefined ? undefined : lineStart + location.column - 1;
};

const locationAt = (
  lineStarts: readonly number[],
  file: string,
  span: Span
): SourceLocation => {
  const line = lineStarts.filter((lineStart) => lineStart <= span.start);
  return {
    file,
    line: line.length,
    column: span.start - (line[line.length - 1] ?? 0) + 1,
    length: span.end - span.start,
  };
};

/**
 * Move a diagnostic of `source` to its place in the fixed text
 */
const relocate = (
  source: string,
  kept: readonly ApplicableFix[],
  lineStarts: LineStarts,
  diagnostic: Diagnostic
): Diagnostic => {
  const { location, fix } = diagnostic;

  const start =
    location === undefined ? undefined : offsetOf(lineStarts.before, location);
  const locationSpan =
    location === undefined || start === undefined
      ? undefined
      : mapSpan(source, kept, { start, end: start + location.length });

  const fixSpan = fix === undefined ? undefined : mapSpan(source, kept, fix);

  return {
    ...diagnostic,
    location:
      location === undefined || locationSpan === undefined
        ? undefined
        : locationAt(lineStarts.after, location.file, locationSpan),
    fix:
      fix === undefined || fixSpan === undefined
        ? undefined
        : { ...fix, ...fixSpan },
  };
};

/**
 * Apply the fixes of `diagnostics` to `source`
 *
 * Fails, leaving the caller to keep the original text, when the result has
 * syntax errors the original did not.
 */
export const applyFixes = (
  source: string,
  diagnostics: readonly Diagnostic[],
  fileName = "fixed.ts"
): Result<ApplyResult, string> => {
  const fixes: readonly ApplicableFix[] = diagnostics
    .flatMap((diagnostic) =>
      diagnostic.fix
        ? [{ ...diagnostic.fix, code: diagnostic.code, diagnostic }]
        : []
    )
    .sort((a, b) => b.end - a.end || b.start - a.start);

  if (fixes.length === 0) {
    return ok({
      modified: source,
      applied: 0,
      skipped: 0,
      skippedReasons: [],
      remaining: diagnostics,
    });
  }

  const kept: ApplicableFix[] = [];
  const skippedReasons: SkippedFix[] = [];

  for (const fix of fixes) {
    if (fix.start < 0 || fix.end > source.length || fix.start > fix.end) {
      skippedReasons.push({
        code: fix.code,
        reason: "Fix range is outside the file",
      });
    } else if (kept.some((other) => rangesOverlap(fix, other))) {
      skippedReasons.push({
        code: fix.code,
        reason: "Fix range overlaps with another fix",
      });
    } else {
      kept.push(fix);
    }
  }

  const modified = kept.reduce(
    (text, fix) =>
      text.slice(0, fix.start) + fix.replacement + text.slice(fix.end),
    source
  );

  if (
    countSyntaxErrors(modified, fileName) > countSyntaxErrors(source, fileName)
  ) {
    return error(`Fixes would create invalid syntax in ${fileName}`);
  }

  const lineStarts: LineStarts = {
    before: lineStartsOf(source, fileName),
    after: lineStartsOf(modified, fileName),
  };

  return ok({
    modified,
    applied: kept.length,
    skipped: skippedReasons.length,
    skippedReasons,
    remaining: diagnostics
      .filter((diagnostic) => !kept.some((fix) => fix.diagnostic === diagnostic))
      .map((diagnostic) => relocate(source, kept, lineStarts, diagnostic)),
  });
};

/**
 * Diagnostic types for chronolint
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "CHR1001" // from(TemporalAccessor) call always throws
  | "CHR1002" // from(TemporalAccessor) call returns its argument
  | "CHR2001" // TypeScript diagnostic in the analysed project
  // Project loading errors (CHR9001-CHR9003)
  | "CHR9001" // tsconfig file not found
  | "CHR9002" // Failed to read tsconfig file
  | "CHR9003"; // Invalid tsconfig file

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

/**
 * Text replacement over [start, end) of the diagnostic's file
 */
export type CodeFix = {
  readonly description: string;
  readonly start: number;
  readonly end: number;
  readonly replacement: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly fix?: CodeFix;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  fix?: CodeFix
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  fix,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});

/**
 * Keep only diagnostics matching a predicate
 */
export const filterDiagnostics = (
  collector: DiagnosticsCollector,
  keep: (diagnostic: Diagnostic) => boolean
): DiagnosticsCollector => {
  const diagnostics = collector.diagnostics.filter(keep);
  return {
    diagnostics,
    hasErrors: diagnostics.some(isError),
  };
};

export const countBySeverity = (
  collector: DiagnosticsCollector
): Readonly<Record<DiagnosticSeverity, number>> =>
  collector.diagnostics.reduce(
    (counts, diagnostic) => ({
      ...counts,
      [diagnostic.severity]: counts[diagnostic.severity] + 1,
    }),
    { error: 0, warning: 0, info: 0 }
  );

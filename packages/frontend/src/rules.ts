/**
 * Rule registry
 *
 * Every check chronolint runs, with the documentation `chronolint explain`
 * prints.
 */

import type * as ts from "typescript";
import type { LintProgram } from "./program.js";
import type {
  DiagnosticCode,
  DiagnosticSeverity,
  DiagnosticsCollector,
} from "./types/diagnostic.js";
import { validateFromTemporalAccessor } from "./validation/from-temporal-accessor.js";

export type RuleLevel = DiagnosticSeverity | "off";

export type RuleExample = {
  readonly description: string;
  readonly code: string;
};

export type RuleDefinition = {
  readonly id: string;
  readonly name: string;
  readonly codes: readonly DiagnosticCode[];
  readonly summary: string;
  readonly explanation: string;
  readonly examples: readonly RuleExample[];
  readonly defaultSeverity: DiagnosticSeverity;
  readonly validate: (
    sourceFile: ts.SourceFile,
    program: LintProgram,
    collector: DiagnosticsCollector,
    severity: DiagnosticSeverity
  ) => DiagnosticsCollector;
};

export const FROM_TEMPORAL_ACCESSOR_RULE: RuleDefinition = {
  id: "from-temporal-accessor",
  name: "FromTemporalAccessor",
  codes: ["CHR1001", "CHR1002"],
  summary:
    "Certain combinations of TemporalType.from(TemporalAccessor) always throw a DateTimeException or return the argument unchanged.",
  explanation:
    "Not every temporal type can be created through from(TemporalAccessor). " +
    "A Month can be created from a LocalDate (Month.from(localDate)) because " +
    "a LocalDate has a year, a month and a day. A LocalDate cannot be created " +
    "from a Month, which has neither the year nor the day, so " +
    "LocalDate.from(month) throws at runtime. This rule uses the static types " +
    "of the receiver and the argument to report such calls before they run. " +
    "Calls whose argument already has the target type return the argument " +
    "itself and are reported with a fix that removes the call.",
  examples: [
    {
      description: "Always throws (CHR1001):",
      code: "const date = LocalDate.from(Month.MARCH);",
    },
    {
      description: "Returns its argument (CHR1002), fixed to `instant`:",
      code: "const copy = Instant.from(instant);",
    },
    {
      description: "Not reported, a Month is derivable from a LocalDate:",
      code: "const month = Month.from(LocalDate.now());",
    },
  ],
  defaultSeverity: "error",
  validate: validateFromTemporalAccessor,
};

export const RULES: readonly RuleDefinition[] = [FROM_TEMPORAL_ACCESSOR_RULE];

/**
 * Find a rule by id, name or one of its diagnostic codes
 */
export const findRule = (key: string): RuleDefinition | undefined =>
  RULES.find(
    (rule) =>
      rule.id === key ||
      rule.name === key ||
      rule.codes.some((code) => code === key)
  );

/**
 * Render full rule documentation, or null for an unknown rule
 */
export const explainRule = (key: string): string | null => {
  const rule = findRule(key);
  if (!rule) {
    return null;
  }

  const sections: string[] = [
    `${rule.name} (${rule.id}): ${rule.codes.join(", ")}`,
    `Default severity: ${rule.defaultSeverity}`,
    "",
    rule.summary,
    "",
    rule.explanation,
  ];

  if (rule.examples.length > 0) {
    sections.push("", "Examples:");
    for (const example of rule.examples) {
      sections.push(`  ${example.description}`, `    ${example.code}`);
    }
  }

  return sections.join("\n");
};

/**
 * Inline suppression comments
 *
 *   // chronolint-ignore-next-line [rule-id ...]
 *   someCall(); // chronolint-ignore-line [rule-id ...]
 *
 * Without rule ids every rule is suppressed on that line. Text after `--`
 * is a free-form reason.
 */

import * as ts from "typescript";
import type { Diagnostic } from "../types/diagnostic.js";

export type Suppression = {
  /** 1-based line the suppression applies to */
  readonly line: number;
  /** Empty means all rules */
  readonly rules: readonly string[];
};

const DIRECTIVE =
  /^\/\/\s*chronolint-ignore-(next-line|line)\b([^\n]*)$|^\/\*\s*chronolint-ignore-(next-line|line)\b([\s\S]*?)\*\/$/;

/**
 * Rule ids before an optional `-- reason`
 */
const parseRuleList = (text: string): readonly string[] => {
  const [ruleText = ""] = text.split("--");
  return ruleText
    .split(/[\s,]+/)
    .map((rule) => rule.trim())
    .filter((rule) => rule.length > 0);
};

/**
 * Every comment of a file, each once: the trivia before each token holds
 * the previous token's trailing comments and the token's leading ones.
 */
const collectComments = (
  sourceFile: ts.SourceFile
): readonly ts.CommentRange[] => {
  const text = sourceFile.text;
  const seen = new Map<number, ts.CommentRange>();

  const visit = (node: ts.Node): void => {
    if (ts.isJSDoc(node)) {
      return;
    }
    const children = node.getChildren(sourceFile);
    if (children.length > 0) {
      children.forEach(visit);
      return;
    }
    const fullStart = node.getFullStart();
    const ranges = [
      ...(ts.getTrailingCommentRanges(text, fullStart) ?? []),
      ...(ts.getLeadingCommentRanges(text, fullStart) ?? []),
    ];
    for (const range of ranges) {
      seen.set(range.pos, range);
    }
  };

  visit(sourceFile);
  return [...seen.values()].sort((a, b) => a.pos - b.pos);
};

/**
 * Scan a file's comments for suppression directives
 */
export const collectSuppressions = (
  sourceFile: ts.SourceFile
): readonly Suppression[] =>
  collectComments(sourceFile).flatMap((range) => {
    const match = DIRECTIVE.exec(sourceFile.text.slice(range.pos, range.end));
    if (!match) {
      return [];
    }

    const kind = match[1] ?? match[3];
    const rules = parseRuleList(match[2] ?? match[4] ?? "");
    const commentLine =
      sourceFile.getLineAndCharacterOfPosition(range.end).line + 1;

    return [
      {
        line: kind === "next-line" ? commentLine + 1 : commentLine,
        rules,
      },
    ];
  });

export const isSuppressed = (
  suppressions: readonly Suppression[],
  diagnostic: Diagnostic,
  ruleId: string
): boolean => {
  const line = diagnostic.location?.line;
  if (line === undefined) {
    return false;
  }
  return suppressions.some(
    (suppression) =>
      suppression.line === line &&
      (suppression.rules.length === 0 || suppression.rules.includes(ruleId))
  );
};

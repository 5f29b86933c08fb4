/**
 * Validation helper functions
 */

import * as ts from "typescript";
import type { SourceLocation } from "../types/diagnostic.js";

/**
 * Get location information for a node
 */
export const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

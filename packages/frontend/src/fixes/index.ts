/**
 * Fixes - Public API
 */

export {
  type ApplyResult,
  type SkippedFix,
  applyFixes,
} from "./fixer.js";

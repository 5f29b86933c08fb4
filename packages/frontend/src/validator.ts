/**
 * Validation rules
 * Main dispatcher - re-exports from validation/ subdirectory
 */

export {
  type ValidationOptions,
  validateProgram,
  validateSourceFile,
  resolveRuleLevel,
  validateFromTemporalAccessor,
  collectSuppressions,
  isSuppressed,
  getNodeLocation,
} from "./validation/index.js";

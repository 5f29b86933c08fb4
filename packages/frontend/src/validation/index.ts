/**
 * Validation - Public API
 */

export {
  type ValidationOptions,
  validateProgram,
  validateSourceFile,
  resolveRuleLevel,
} from "./orchestrator.js";
export { validateFromTemporalAccessor } from "./from-temporal-accessor.js";
export {
  type CallSiteContext,
  createCandidateCall,
  createTypeResolver,
  getFromCallee,
} from "./call-site.js";
export {
  type Suppression,
  collectSuppressions,
  isSuppressed,
} from "./suppressions.js";
export { getNodeLocation } from "./helpers.js";

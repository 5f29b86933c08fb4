/**
 * Temporal - Public API
 */

export {
  TEMPORAL_TYPE_TAGS,
  PRIMARY_TEMPORAL_TYPE_TAGS,
  EXTRA_TEMPORAL_TYPE_TAGS,
  type TemporalTypeTag,
  isTemporalTypeTag,
} from "./tags.js";
export {
  type TemporalLibrary,
  DEFAULT_TEMPORAL_LIBRARIES,
  packageOfFile,
  moduleOfNode,
  findLibraryForModule,
  isLibraryModule,
} from "./libraries.js";
export {
  type CompatibilityTable,
  type IncompatibleConversionData,
  type IncompatiblePair,
  CompatibilityTableError,
  COMPATIBILITY_TABLE,
  createCompatibilityTable,
  isKnownIncompatible,
} from "./compatibility.js";
export {
  type TypeResolver,
  type CandidateCall,
  type NoFindingReason,
  type Verdict,
  evaluateFromCall,
} from "./evaluate.js";

/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { type ParsedArgs, parseArgs } from "./parser.js";
export {
  runCli,
  EXIT_OK,
  EXIT_FINDINGS,
  EXIT_USAGE,
  EXIT_CONFIG,
  EXIT_PROGRAM,
  EXIT_FIX,
} from "./dispatcher.js";

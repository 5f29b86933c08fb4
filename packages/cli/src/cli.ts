/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  showHelp,
  parseArgs,
  runCli,
  EXIT_OK,
  EXIT_FINDINGS,
  EXIT_USAGE,
  EXIT_CONFIG,
  EXIT_PROGRAM,
  EXIT_FIX,
} from "./cli/index.js";

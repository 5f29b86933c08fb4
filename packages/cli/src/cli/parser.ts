/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  /** Positional arguments after the command */
  positionals: string[];
  options: CliOptions;
  /** Unrecognised options, reported as usage errors */
  unknownOptions: string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const positionals: string[] = [];
  const unknownOptions: string[] = [];
  let onlyPositionals = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Everything after "--" is a file name
    if (arg === "--" && !onlyPositionals) {
      onlyPositionals = true;
      continue;
    }

    if (onlyPositionals || !arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return {
          command: "help",
          positionals: [],
          options: {},
          unknownOptions: [],
        };
      case "-v":
      case "--version":
        return {
          command: "version",
          positionals: [],
          options: {},
          unknownOptions: [],
        };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-p":
      case "--project":
        options.project = args[++i] ?? "";
        break;
      case "-f":
      case "--format":
        options.format = args[++i] ?? "";
        break;
      case "--fix":
        options.fix = true;
        break;
      case "--table":
        options.table = true;
        break;
      default:
        unknownOptions.push(arg);
    }
  }

  return { command, positionals, options, unknownOptions };
};

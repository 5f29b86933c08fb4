/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@chronolint/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import type { ChronolintConfig } from "../types.js";
import { checkCommand } from "../commands/check.js";
import { explainCommand, rulesCommand } from "../commands/explain.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_PROGRAM = 4;
export const EXIT_FIX = 5;

const usageError = (message: string): number => {
  console.error(`Error: ${message}`);
  console.error("Run 'chronolint --help' for usage information");
  return EXIT_USAGE;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`chronolint v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  const [unknownOption] = parsed.unknownOptions;
  if (unknownOption !== undefined) {
    return usageError(`Unknown option '${unknownOption}'`);
  }

  switch (parsed.command) {
    case "explain": {
      const [key, ...extra] = parsed.positionals;
      if (key === undefined || extra.length > 0) {
        return usageError("explain takes exactly one rule id or code");
      }
      const result = explainCommand(key);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT_USAGE;
      }
      return EXIT_OK;
    }

    case "rules": {
      if (parsed.positionals.length > 0) {
        return usageError("rules takes no arguments");
      }
      rulesCommand({ table: parsed.options.table ?? false });
      return EXIT_OK;
    }

    case "check":
      break;

    default:
      return usageError(`Unknown command '${parsed.command}'`);
  }

  const { format } = parsed.options;
  if (format !== undefined && format !== "text" && format !== "json") {
    return usageError(`Unknown format '${format}' (expected text or json)`);
  }

  // Load config; without a chronolint.json the defaults apply
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let config: ChronolintConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT_CONFIG;
    }
    config = configResult.value;
  }

  // Project root is the directory containing chronolint.json
  const projectRoot = configPath ? dirname(configPath) : cwd;
  const resolved = resolveConfig(
    config,
    parsed.options,
    projectRoot,
    parsed.positionals.map((file) => resolve(cwd, file))
  );

  if (resolved.verbose) {
    console.log(`Config: ${configPath ?? "(none, using defaults)"}`);
  }

  const result = checkCommand(resolved);
  if (!result.ok) {
    if (result.error.kind === "fix") {
      console.error(`Error: ${result.error.message}`);
      return EXIT_FIX;
    }
    for (const diagnostic of result.error.diagnostics) {
      console.error(formatDiagnostic(diagnostic));
    }
    return EXIT_PROGRAM;
  }

  return result.value.errors > 0 ? EXIT_FINDINGS : EXIT_OK;
};

/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
chronolint - static checks for temporal conversions v${VERSION}

USAGE:
  chronolint <command> [options]

COMMANDS:
  check [files...]          Check the project (or only the given files)
  explain <rule|code>       Describe a rule and its diagnostics
  rules                     List the available rules
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Only print diagnostics
  -c, --config <file>       Config file path (default: chronolint.json)

CHECK OPTIONS:
  -p, --project <file>      tsconfig.json of the project
  -f, --format <format>     Output format: text or json (default: text)
  --fix                     Replace calls that return their argument

RULES OPTIONS:
  --table                   Print every incompatible conversion

EXIT CODES:
  0  No error diagnostics
  1  Error diagnostics found
  2  Usage error
  3  Invalid configuration
  4  Project could not be loaded
  5  Fixes could not be applied

EXAMPLES:
  chronolint check
  chronolint check src/schedule.ts --format json
  chronolint check --fix
  chronolint explain CHR1001
  chronolint rules --table
`);
};

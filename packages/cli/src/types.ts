/**
 * Type definitions for CLI
 */

import type { RuleLevel, TemporalTypeTag } from "@chronolint/frontend";

export type OutputFormat = "text" | "json";

/**
 * Temporal library entry in chronolint.json
 */
export type LibraryConfig = {
  readonly name: string;
  readonly modules: readonly string[];
  readonly types: readonly TemporalTypeTag[];
  readonly accessorType?: string;
};

/**
 * chronolint configuration file (chronolint.json)
 */
export type ChronolintConfig = {
  readonly $schema?: string;
  readonly tsconfig?: string;
  readonly files?: readonly string[];
  readonly rules?: Readonly<Record<string, RuleLevel>>;
  readonly libraries?: readonly LibraryConfig[];
  readonly trustedPaths?: readonly string[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  project?: string;
  fix?: boolean;
  format?: string;
  table?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  /** Absent when the given files are compiled with default options */
  readonly tsconfig: string | undefined;
  readonly files: readonly string[] | undefined;
  readonly rules: Readonly<Record<string, RuleLevel>>;
  readonly libraries: readonly LibraryConfig[] | undefined;
  readonly trustedPaths: readonly string[];
  readonly fix: boolean;
  readonly format: OutputFormat;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  type Result,
  type RuleLevel,
  type TemporalTypeTag,
  all,
  error,
  flatMap,
  ok,
  findRule,
  isTemporalTypeTag,
} from "@chronolint/frontend";
import type {
  ChronolintConfig,
  CliOptions,
  LibraryConfig,
  OutputFormat,
  ResolvedConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "chronolint.json";

const RULE_LEVELS: readonly string[] = ["error", "warning", "info", "off"];

const isRuleLevel = (value: unknown): value is RuleLevel =>
  typeof value === "string" && RULE_LEVELS.includes(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const validateStringArray = (
  value: unknown,
  field: string
): Result<readonly string[] | undefined, string> => {
  if (value === undefined) {
    return ok(undefined);
  }
  return isStringArray(value)
    ? ok(value)
    : error(`${CONFIG_FILE_NAME}: '${field}' must be an array of strings`);
};

const validateRules = (
  value: unknown
): Result<Readonly<Record<string, RuleLevel>> | undefined, string> => {
  if (value === undefined) {
    return ok(undefined);
  }
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: 'rules' must be an object`);
  }

  const rules: Record<string, RuleLevel> = {};
  for (const [ruleId, level] of Object.entries(value)) {
    const rule = findRule(ruleId);
    if (!rule || rule.id !== ruleId) {
      return error(`${CONFIG_FILE_NAME}: unknown rule '${ruleId}'`);
    }
    if (!isRuleLevel(level)) {
      return error(
        `${CONFIG_FILE_NAME}: rule '${ruleId}' has invalid level '${String(level)}' (expected ${RULE_LEVELS.join(", ")})`
      );
    }
    rules[ruleId] = level;
  }
  return ok(rules);
};

const validateLibrary = (
  value: unknown,
  index: number
): Result<LibraryConfig, string> => {
  const where = `${CONFIG_FILE_NAME}: libraries[${index}]`;
  if (!isRecord(value)) {
    return error(`${where} must be an object`);
  }

  const { name, modules, types, accessorType } = value;
  if (typeof name !== "string" || name.length === 0) {
    return error(`${where}: 'name' is required`);
  }
  if (!isStringArray(modules) || modules.length === 0) {
    return error(`${where}: 'modules' must be a non-empty array of strings`);
  }
  if (!isStringArray(types)) {
    return error(`${where}: 'types' must be an array of strings`);
  }
  if (accessorType !== undefined && typeof accessorType !== "string") {
    return error(`${where}: 'accessorType' must be a string`);
  }

  const tags: TemporalTypeTag[] = [];
  for (const type of types) {
    if (!isTemporalTypeTag(type)) {
      return error(`${where}: unknown temporal type '${type}'`);
    }
    tags.push(type);
  }

  return ok({
    name,
    modules,
    types: tags,
    accessorType: typeof accessorType === "string" ? accessorType : undefined,
  });
};

const validateLibraries = (
  value: unknown
): Result<readonly LibraryConfig[] | undefined, string> => {
  if (value === undefined) {
    return ok(undefined);
  }
  if (!Array.isArray(value)) {
    return error(`${CONFIG_FILE_NAME}: 'libraries' must be an array`);
  }

  return all(
    value.map((entry: unknown, index: number) => validateLibrary(entry, index))
  );
};

/**
 * Validate parsed chronolint.json content
 */
export const validateConfig = (
  raw: unknown
): Result<ChronolintConfig, string> => {
  if (!isRecord(raw)) {
    return error(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }

  const { tsconfig, $schema } = raw;
  if (tsconfig !== undefined && typeof tsconfig !== "string") {
    return error(`${CONFIG_FILE_NAME}: 'tsconfig' must be a string`);
  }
  if ($schema !== undefined && typeof $schema !== "string") {
    return error(`${CONFIG_FILE_NAME}: '$schema' must be a string`);
  }

  const files = validateStringArray(raw.files, "files");
  if (!files.ok) return files;
  const trustedPaths = validateStringArray(raw.trustedPaths, "trustedPaths");
  if (!trustedPaths.ok) return trustedPaths;
  const rules = validateRules(raw.rules);
  if (!rules.ok) return rules;
  const libraries = validateLibraries(raw.libraries);
  if (!libraries.ok) return libraries;

  return ok({
    $schema: typeof $schema === "string" ? $schema : undefined,
    tsconfig: typeof tsconfig === "string" ? tsconfig : undefined,
    files: files.value,
    rules: rules.value,
    libraries: libraries.value,
    trustedPaths: trustedPaths.value,
  });
};

const readJson = (configPath: string): Result<unknown, string> => {
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    return ok(parsed);
  } catch (err) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};

/**
 * Load chronolint.json
 */
export const loadConfig = (
  configPath: string
): Result<ChronolintConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  return flatMap(readJson(configPath), validateConfig);
};

/**
 * Find chronolint.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const resolveFormat = (format: string | undefined): OutputFormat =>
  format === "json" ? "json" : "text";

/**
 * Resolve final configuration from file + CLI args
 *
 * Files given on the command line replace the configured ones. Without a
 * tsconfig named anywhere, `tsconfig.json` is used when it exists, or the
 * files are compiled with default options.
 */
export const resolveConfig = (
  config: ChronolintConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cliFiles: readonly string[] = []
): ResolvedConfig => {
  const files = cliFiles.length > 0 ? cliFiles : config.files;
  const namedTsconfig = cliOptions.project ?? config.tsconfig;
  const tsconfig =
    namedTsconfig ??
    (files !== undefined && !existsSync(join(projectRoot, "tsconfig.json"))
      ? undefined
      : "tsconfig.json");

  return {
    projectRoot,
    tsconfig,
    files,
    rules: config.rules ?? {},
    libraries: config.libraries,
    trustedPaths: config.trustedPaths ?? [],
    fix: cliOptions.fix ?? false,
    format: resolveFormat(cliOptions.format),
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};

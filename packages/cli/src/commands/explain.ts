/**
 * chronolint explain and rules commands - Rule documentation
 */

import {
  type Result,
  COMPATIBILITY_TABLE,
  RULES,
  error,
  explainRule,
  ok,
} from "@chronolint/frontend";

/**
 * Print the documentation of a rule, by id, name or diagnostic code
 */
export const explainCommand = (key: string): Result<void, string> => {
  const text = explainRule(key);
  if (text === null) {
    return error(
      `Unknown rule or code '${key}'. Run 'chronolint rules' to list the rules`
    );
  }
  console.log(text);
  return ok(undefined);
};

/**
 * List the rules; with `table`, every incompatible conversion as well
 */
export const rulesCommand = (options: { readonly table: boolean }): void => {
  for (const rule of RULES) {
    console.log(
      `${rule.id.padEnd(24)} ${rule.codes.join(", ").padEnd(18)} ${rule.defaultSeverity}`
    );
  }

  if (!options.table) {
    return;
  }

  const pairs = COMPATIBILITY_TABLE.listIncompatiblePairs();
  console.log("");
  console.log(`Incompatible conversions (${pairs.length}):`);
  for (const { target, source } of pairs) {
    console.log(`  ${target}.from(${source})`);
  }
};

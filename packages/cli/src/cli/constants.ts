/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  findConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";
import type { ChronolintConfig, CliOptions } from "./types.js";

describe("Config", () => {
  describe("validateConfig", () => {
    it("should accept an empty object", () => {
      expect(validateConfig({})).to.deep.equal({
        ok: true,
        value: {
          $schema: undefined,
          tsconfig: undefined,
          files: undefined,
          rules: undefined,
          libraries: undefined,
          trustedPaths: undefined,
        },
      });
    });

    it("should accept every field", () => {
      const result = validateConfig({
        tsconfig: "tsconfig.app.json",
        files: ["src/index.ts"],
        rules: { "from-temporal-accessor": "warning" },
        libraries: [
          {
            name: "in-house",
            modules: ["@acme/time"],
            types: ["LocalDate", "Quarter"],
            accessorType: "TemporalLike",
          },
        ],
        trustedPaths: ["src/time"],
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.rules).to.deep.equal({
        "from-temporal-accessor": "warning",
      });
      expect(result.value.libraries).to.deep.equal([
        {
          name: "in-house",
          modules: ["@acme/time"],
          types: ["LocalDate", "Quarter"],
          accessorType: "TemporalLike",
        },
      ]);
    });

    it("should reject a non-object", () => {
      expect(validateConfig([])).to.deep.equal({
        ok: false,
        error: "chronolint.json must contain a JSON object",
      });
    });

    it("should reject unknown rules", () => {
      expect(validateConfig({ rules: { "no-dates": "error" } })).to.deep.equal(
        {
          ok: false,
          error: "chronolint.json: unknown rule 'no-dates'",
        }
      );
    });

    it("should reject rules named by diagnostic code", () => {
      expect(validateConfig({ rules: { CHR1001: "off" } })).to.deep.equal({
        ok: false,
        error: "chronolint.json: unknown rule 'CHR1001'",
      });
    });

    it("should reject invalid rule levels", () => {
      expect(
        validateConfig({ rules: { "from-temporal-accessor": "fatal" } })
      ).to.deep.equal({
        ok: false,
        error:
          "chronolint.json: rule 'from-temporal-accessor' has invalid level 'fatal' (expected error, warning, info, off)",
      });
    });

    it("should reject unknown temporal types", () => {
      expect(
        validateConfig({
          libraries: [{ name: "x", modules: ["x"], types: ["Decade"] }],
        })
      ).to.deep.equal({
        ok: false,
        error:
          "chronolint.json: libraries[0]: unknown temporal type 'Decade'",
      });
    });

    it("should reject libraries without modules", () => {
      expect(
        validateConfig({ libraries: [{ name: "x", modules: [], types: [] }] })
      ).to.deep.equal({
        ok: false,
        error:
          "chronolint.json: libraries[0]: 'modules' must be a non-empty array of strings",
      });
    });

    it("should reject non-string file lists", () => {
      expect(validateConfig({ files: ["a.ts", 1] })).to.deep.equal({
        ok: false,
        error: "chronolint.json: 'files' must be an array of strings",
      });
    });

    it("should reject a non-string tsconfig", () => {
      expect(validateConfig({ tsconfig: true })).to.deep.equal({
        ok: false,
        error: "chronolint.json: 'tsconfig' must be a string",
      });
    });
  });

  describe("files", () => {
    let tempDir = "";

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "chronolint-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should load and validate a config file", () => {
      const configPath = path.join(tempDir, "chronolint.json");
      fs.writeFileSync(configPath, JSON.stringify({ trustedPaths: ["lib"] }));

      const result = loadConfig(configPath);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.trustedPaths).to.deep.equal(["lib"]);
    });

    it("should report a missing config file", () => {
      const configPath = path.join(tempDir, "chronolint.json");
      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${configPath}`,
      });
    });

    it("should report invalid JSON", () => {
      const configPath = path.join(tempDir, "chronolint.json");
      fs.writeFileSync(configPath, "{ rules: ");

      const result = loadConfig(configPath);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.match(/^Failed to parse chronolint\.json: /);
    });

    it("should find the config in a parent directory", () => {
      const configPath = path.join(tempDir, "chronolint.json");
      fs.writeFileSync(configPath, "{}");
      const nested = path.join(tempDir, "src", "time");
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfig(nested)).to.equal(configPath);
    });
  });

  describe("resolveConfig", () => {
    let tempDir = "";

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "chronolint-resolve-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should apply defaults", () => {
      const result = resolveConfig({}, {}, tempDir);

      expect(result).to.deep.equal({
        projectRoot: tempDir,
        tsconfig: "tsconfig.json",
        files: undefined,
        rules: {},
        libraries: undefined,
        trustedPaths: [],
        fix: false,
        format: "text",
        verbose: false,
        quiet: false,
      });
    });

    it("should override config with CLI options", () => {
      const config: ChronolintConfig = {
        tsconfig: "tsconfig.app.json",
        files: ["src/a.ts"],
      };
      const cliOptions: CliOptions = {
        project: "tsconfig.test.json",
        format: "json",
        fix: true,
        quiet: true,
      };

      const result = resolveConfig(config, cliOptions, tempDir, ["src/b.ts"]);
      expect(result.tsconfig).to.equal("tsconfig.test.json");
      expect(result.files).to.deep.equal(["src/b.ts"]);
      expect(result.format).to.equal("json");
      expect(result.fix).to.equal(true);
      expect(result.quiet).to.equal(true);
    });

    it("should compile files with defaults when no tsconfig exists", () => {
      const result = resolveConfig({}, {}, tempDir, ["src/a.ts"]);
      expect(result.tsconfig).to.be.undefined;
    });

    it("should use an existing tsconfig.json for given files", () => {
      fs.writeFileSync(path.join(tempDir, "tsconfig.json"), "{}");
      const result = resolveConfig({}, {}, tempDir, ["src/a.ts"]);
      expect(result.tsconfig).to.equal("tsconfig.json");
    });
  });
});

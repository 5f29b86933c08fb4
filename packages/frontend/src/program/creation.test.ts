/**
 * Tests for program creation
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createProgram } from "./creation.js";
import { getSourceFile, isTrustedFile } from "./queries.js";
import { DEFAULT_TEMPORAL_LIBRARIES } from "../temporal/libraries.js";

describe("Program Creation", () => {
  let tempDir = "";

  const write = (relativePath: string, text: string): void => {
    const filePath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text);
  };

  const checkedFiles = (
    sourceFiles: readonly { readonly fileName: string }[]
  ): readonly string[] =>
    sourceFiles
      .map((sf) => path.relative(tempDir, sf.fileName).split(path.sep).join("/"))
      .sort();

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "chronolint-program-"));
    write(
      "tsconfig.json",
      JSON.stringify(
        {
          compilerOptions: {
            target: "es2022",
            strict: true,
            module: "commonjs",
            types: [],
          },
          include: ["src"],
        },
        null,
        2
      )
    );
    write("src/a.ts", "export const a = 1;\n");
    write("src/b.ts", "export const b = 2;\n");
    write("src/types.d.ts", "declare const marker: number;\n");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should check the files a tsconfig includes", () => {
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "tsconfig.json",
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(checkedFiles(result.value.sourceFiles)).to.deep.equal([
      "src/a.ts",
      "src/b.ts",
    ]);
    expect(result.value.libraries).to.equal(DEFAULT_TEMPORAL_LIBRARIES);
    expect(result.value.typeDiagnostics.diagnostics).to.deep.equal([]);
  });

  it("should narrow a tsconfig program to the given files", () => {
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "tsconfig.json",
      files: ["src/b.ts"],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(checkedFiles(result.value.sourceFiles)).to.deep.equal(["src/b.ts"]);
  });

  it("should add given files the tsconfig does not include", () => {
    write("scripts/seed.ts", "export const seed = 3;\n");
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "tsconfig.json",
      files: ["scripts/seed.ts"],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(checkedFiles(result.value.sourceFiles)).to.deep.equal([
      "scripts/seed.ts",
    ]);
  });

  it("should compile given files with default options without a tsconfig", () => {
    const result = createProgram({
      projectRoot: tempDir,
      files: ["src/a.ts"],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(checkedFiles(result.value.sourceFiles)).to.deep.equal(["src/a.ts"]);
    expect(result.value.program.getCompilerOptions().strict).to.equal(true);
  });

  it("should report type errors of the analysed code without failing", () => {
    write("src/a.ts", 'export const a: number = "one";\n');
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "tsconfig.json",
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const codes = result.value.typeDiagnostics.diagnostics.map((d) => d.code);
    expect(codes).to.deep.equal(["CHR2001"]);
    expect(result.value.typeDiagnostics.diagnostics[0]?.location?.line).to.equal(
      1
    );
  });

  it("should keep the configured libraries", () => {
    const libraries = [
      { name: "in-house", modules: ["@acme/time"], types: ["Year" as const] },
    ];
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "tsconfig.json",
      libraries,
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.libraries).to.equal(libraries);
  });

  it("should fail when the tsconfig does not exist", () => {
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "missing.json",
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    const [diagnostic] = result.error.diagnostics;
    expect(diagnostic?.code).to.equal("CHR9001");
    expect(diagnostic?.message).to.equal(
      `tsconfig file not found: ${path.join(tempDir, "missing.json")}`
    );
    expect(diagnostic?.hint).to.equal(
      "Pass --project or set 'tsconfig' in chronolint.json"
    );
  });

  it("should fail when the tsconfig cannot be read as JSON", () => {
    write("broken.json", "{ compilerOptions: ");
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "broken.json",
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "CHR9002",
    ]);
  });

  it("should fail when the tsconfig has invalid options", () => {
    write(
      "invalid.json",
      JSON.stringify({ compilerOptions: { target: "es1999" } })
    );
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "invalid.json",
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "CHR9003",
    ]);
  });

  it("should look up source files and trusted paths", () => {
    const result = createProgram({
      projectRoot: tempDir,
      tsconfig: "tsconfig.json",
      trustedPaths: ["./src/b.ts", "vendor/"],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const program = result.value;
    expect(getSourceFile(program, "src/a.ts")?.text).to.equal(
      "export const a = 1;\n"
    );
    expect(getSourceFile(program, "src/missing.ts")).to.equal(null);
    expect(isTrustedFile(program, path.join(tempDir, "src/b.ts"))).to.equal(
      true
    );
    expect(
      isTrustedFile(program, path.join(tempDir, "vendor/time/zone.ts"))
    ).to.equal(true);
    expect(isTrustedFile(program, path.join(tempDir, "src/a.ts"))).to.equal(
      false
    );
    expect(isTrustedFile(program, path.join(tempDir, "vendors/a.ts"))).to.equal(
      false
    );
  });
});

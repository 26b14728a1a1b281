import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runBuildCommand } from "../../src/cli/build-command.js";
import { formatDiagnostic } from "../../src/cli/diagnostics.js";
import { runInfoCommand } from "../../src/cli/info-command.js";
import { runLintCommand } from "../../src/cli/lint-command.js";
import { runVerifyCommand } from "../../src/cli/verify-command.js";
import {
  ExternalToolError,
  IOError,
  IntegrityError,
  RecipeError,
} from "../../src/errors/index.js";
import type { Extractor, Fetcher } from "../../src/pipeline/index.js";

const ARCHIVE_BYTES = "demo release 1.0";
const ARCHIVE_SHA = crypto
  .createHash("sha256")
  .update(ARCHIVE_BYTES)
  .digest("hex");

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pkgforge-cli-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

const fetcher: Fetcher = {
  async fetch(_url, destination) {
    await fs.writeFile(destination, ARCHIVE_BYTES, "utf8");
  },
};

const extractor: Extractor = {
  async extract(_archivePath, destination) {
    await fs.mkdir(path.join(destination, "demo-1.0"), { recursive: true });
  },
};

function recipeYaml(options: { sha?: string; url?: string } = {}): string {
  return [
    "name: demo",
    'version: "1.0"',
    "release: 1",
    "license: MIT",
    "summary: Demo package",
    `url: ${options.url ?? "https://example.com/demo"}`,
    "source:",
    '  url: "https://example.com/{{name}}-{{version}}.tar.gz"',
    `  sha256: "${options.sha ?? ARCHIVE_SHA}"`,
    "stages:",
    "  build: echo built > build.log",
    "  install: |",
    '    mkdir -p "{{buildroot}}/usr/bin"',
    '    cp build.log "{{buildroot}}/usr/bin/demo"',
    "files:",
    "  - /usr/bin/demo",
    "",
  ].join("\n");
}

async function writeRecipe(content: string): Promise<string> {
  const recipePath = path.join(tempDir, "demo.yaml");
  await fs.writeFile(recipePath, content, "utf8");
  return recipePath;
}

describe("verify command", () => {
  it("accepts an archive with the expected digest", async () => {
    const archive = path.join(tempDir, "demo-1.0.tar.gz");
    await fs.writeFile(archive, ARCHIVE_BYTES, "utf8");

    const result = await runVerifyCommand({
      archive,
      sha256: ARCHIVE_SHA.toUpperCase(),
    });

    expect(result.matches).toBe(true);
    expect(result.actual).toBe(ARCHIVE_SHA);
  });

  it("rejects a substituted archive", async () => {
    const archive = path.join(tempDir, "demo-1.0.tar.gz");
    await fs.writeFile(archive, "something else", "utf8");

    await expect(
      runVerifyCommand({ archive, sha256: ARCHIVE_SHA }),
    ).rejects.toBeInstanceOf(IntegrityError);
  });

  it("rejects a malformed digest before reading the archive", async () => {
    const error = await runVerifyCommand({
      archive: path.join(tempDir, "missing.tar.gz"),
      sha256: "a".repeat(65),
    }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(RecipeError);
    expect(error instanceof Error && error.message).toBe(
      "Invalid --sha256: sha256 digest must be 64 hex characters (got 65)",
    );
  });

  it("requires exactly one digest option", async () => {
    await expect(
      runVerifyCommand({ archive: "x", sha256: "a", sha512: "b" }),
    ).rejects.toThrow("pass only one of --sha256 or --sha512");
    await expect(runVerifyCommand({ archive: "x" })).rejects.toThrow(
      "an expected digest is required",
    );
  });
});

describe("lint command", () => {
  it("reports warnings and a summary line", async () => {
    const recipe = await writeRecipe(
      recipeYaml({ url: "http://example.com/demo" }).replace(
        "echo built > build.log",
        "echo {{jobs}} > build.log",
      ),
    );

    const result = await runLintCommand({ recipe, cwd: tempDir });

    expect(result.errors).toEqual([]);
    expect(result.output.split("\n")).toEqual([
      "warning: url uses plain http",
      "warning: stages.build references unknown macro '{{jobs}}'",
      "demo.yaml: 0 error(s), 2 warning(s)",
    ]);
  });

  it("treats macros from the build configuration as known", async () => {
    const recipe = await writeRecipe(
      recipeYaml().replace("echo built > build.log", "echo {{jobs}} > build.log"),
    );
    await fs.writeFile(
      path.join(tempDir, "pkgforge.yaml"),
      "macros:\n  jobs: \"4\"\n",
      "utf8",
    );

    const result = await runLintCommand({ recipe, cwd: tempDir });

    expect(result.warnings).toEqual([]);
  });

  it("reports schema errors", async () => {
    const recipe = await writeRecipe(recipeYaml({ sha: "xyz" }));

    const result = await runLintCommand({ recipe, cwd: tempDir });

    expect(result.errors).toEqual([
      "source.sha256 digest must be hexadecimal",
    ]);
    expect(result.output.split("\n").at(-1)).toBe(
      "demo.yaml: 1 error(s), 0 warning(s)",
    );
  });
});

describe("info command", () => {
  it("prints package metadata as JSON", async () => {
    const recipe = await writeRecipe(recipeYaml());

    const output = await runInfoCommand({ recipe, format: "json" });
    const parsed: unknown = JSON.parse(output);

    expect(parsed).toMatchObject({
      name: "demo",
      version: "1.0",
      release: "1",
      source: { sha256: ARCHIVE_SHA },
      files: ["/usr/bin/demo"],
    });
  });

  it("fails with IOError for a missing recipe", async () => {
    await expect(
      runInfoCommand({ recipe: path.join(tempDir, "none.yaml"), format: "md" }),
    ).rejects.toBeInstanceOf(IOError);
  });
});

describe("build command", () => {
  it("runs the lifecycle and renders a JSON report", async () => {
    const recipe = await writeRecipe(recipeYaml());
    const out = path.join(tempDir, "report.json");

    const result = await runBuildCommand(
      {
        recipe,
        format: "json",
        out,
        cwd: tempDir,
        env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
        collaborators: { fetcher, extractor },
      },
      "0.1.0",
    );

    expect(result.error).toBeUndefined();
    expect(result.report.ok).toBe(true);
    expect(result.report.files).toEqual(["/usr/bin/demo"]);
    expect(result.report.source.archive).toBe(
      path.join(tempDir, ".pkgforge", "SOURCES", "demo-1.0.tar.gz"),
    );
    expect(await fs.readFile(out, "utf8")).toBe(result.output);
  });

  it("returns the integrity failure without running build", async () => {
    const recipe = await writeRecipe(recipeYaml({ sha: "0".repeat(64) }));

    const result = await runBuildCommand(
      {
        recipe,
        format: "md",
        cwd: tempDir,
        env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
        collaborators: { fetcher, extractor },
      },
      "0.1.0",
    );

    expect(result.error).toBeInstanceOf(IntegrityError);
    expect(result.report.error?.kind).toBe("integrity");
    expect(result.report.source.actual).toBe(ARCHIVE_SHA);
    expect(result.report.stages.map((stage) => stage.status)).toEqual([
      "failed",
      "skipped",
      "skipped",
      "skipped",
      "skipped",
      "skipped",
    ]);
  });
});

describe("formatDiagnostic", () => {
  it("prefixes the stage", () => {
    const error = new IntegrityError({
      archivePath: "/src/demo.tar.gz",
      expected: "a".repeat(64),
      actual: "b".repeat(64),
      stage: "prep",
    });
    expect(formatDiagnostic(error)).toBe(
      "[prep] invalid checksum for /src/demo.tar.gz",
    );
  });

  it("appends the tail of tool stderr", () => {
    const stderr = Array.from({ length: 12 }, (_, i) => `line ${i + 1}`).join("\n");
    const error = new ExternalToolError({
      stage: "build",
      command: "build script",
      exitCode: 2,
      stderr,
    });
    const lines = formatDiagnostic(error).split("\n");
    expect(lines[0]).toBe("[build] build script exited with status 2");
    expect(lines.slice(1)).toEqual(
      Array.from({ length: 10 }, (_, i) => `line ${i + 3}`),
    );
  });

  it("prints plain errors without a prefix", () => {
    expect(formatDiagnostic(new Error("boom"))).toBe("boom");
    expect(
      formatDiagnostic(new RecipeError("demo.yaml", ["files is required"])),
    ).toBe("Invalid demo.yaml: files is required");
  });
});

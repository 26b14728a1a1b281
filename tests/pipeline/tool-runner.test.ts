import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ExternalToolError } from "../../src/errors/index.js";
import { ShellToolRunner } from "../../src/pipeline/index.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pkgforge-runner-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("ShellToolRunner", () => {
  it("runs the script in the given directory with only the given env", async () => {
    const chunks: string[] = [];
    await new ShellToolRunner().run({
      stage: "build",
      script: 'echo "$GREETING from $(basename "$PWD")"',
      cwd: tempDir,
      env: { GREETING: "hello" },
      onOutput: (stream, chunk) => chunks.push(`${stream}:${chunk}`),
    });

    expect(chunks.join("")).toBe(
      `stdout:hello from ${path.basename(tempDir)}\n`,
    );
  });

  it("keeps multi-byte characters intact across output chunks", async () => {
    const content = `a${"\u00e9".repeat(100_000)}`;
    await fs.writeFile(path.join(tempDir, "big.txt"), content, "utf8");
    const chunks: string[] = [];

    await new ShellToolRunner().run({
      stage: "build",
      script: "cat big.txt",
      cwd: tempDir,
      env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
      onOutput: (_stream, chunk) => chunks.push(chunk),
    });

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.join("")).toBe(content);
  });

  it("stops at the first failing command", async () => {
    const error = await new ShellToolRunner()
      .run({
        stage: "install",
        script: "echo first >&2\nfalse\necho never > after.txt",
        cwd: tempDir,
        env: {},
      })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ExternalToolError);
    if (!(error instanceof ExternalToolError)) {
      return;
    }
    expect(error.stage).toBe("install");
    expect(error.exitCode).toBe(1);
    expect(error.stderr).toBe("first");
    expect(error.message).toBe("install script exited with status 1");
    await expect(fs.access(path.join(tempDir, "after.txt"))).rejects.toThrow();
  });

  it("reports a shell that cannot be started", async () => {
    const runner = new ShellToolRunner(path.join(tempDir, "missing-shell"));
    const error = await runner
      .run({ stage: "check", script: "true", cwd: tempDir, env: {} })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error instanceof ExternalToolError && error.exitCode).toBeNull();
    expect(error instanceof Error && error.message).toBe(
      "check script could not be started",
    );
  });
});

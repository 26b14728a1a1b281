import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ExternalToolError } from "../errors/index.js";
import type { Extractor } from "./types.js";

const execFileAsync = promisify(execFile);

export class TarExtractor implements Extractor {
  constructor(private readonly tarPath: string = "tar") {}

  async extract(archivePath: string, destination: string): Promise<void> {
    const args = ["-xf", archivePath, "-C", destination];
    try {
      await execFileAsync(this.tarPath, args, { maxBuffer: 16 * 1024 * 1024 });
    } catch (error) {
      throw new ExternalToolError({
        stage: "prep",
        command: [this.tarPath, ...args].join(" "),
        exitCode: exitCodeOf(error),
        stderr: stderrOf(error),
        cause: error,
      });
    }
  }
}

function exitCodeOf(error: unknown): number | null {
  if (error instanceof Error && "code" in error && typeof error.code === "number") {
    return error.code;
  }
  return null;
}

function stderrOf(error: unknown): string {
  if (error instanceof Error && "stderr" in error) {
    return String(error.stderr).trim();
  }
  return error instanceof Error ? error.message : String(error);
}

import { ExternalToolError, isPackagingError } from "../errors/index.js";

const STDERR_TAIL_LINES = 10;

export function formatDiagnostic(error: unknown): string {
  if (!isPackagingError(error)) {
    return error instanceof Error ? error.message : String(error);
  }
  const prefix = error.stage ? `[${error.stage}] ` : "";
  const lines = [`${prefix}${error.message}`];
  if (error instanceof ExternalToolError && error.stderr) {
    lines.push(...error.stderr.split("\n").slice(-STDERR_TAIL_LINES));
  }
  return lines.join("\n");
}

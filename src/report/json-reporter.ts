import { IntegrityError, isPackagingError } from "../errors/index.js";
import type { LifecycleResult } from "../pipeline/index.js";
import type { Recipe } from "../recipe/index.js";
import type { ErrorReport, RunReport } from "./types.js";

export const TOOL_NAME = "pkgforge";

export interface RunReportInput {
  readonly toolVersion: string;
  readonly recipe: Recipe;
  readonly result: LifecycleResult;
}

export function buildRunReport(input: RunReportInput): RunReport {
  const { descriptor, source } = input.recipe;
  const { result } = input;
  const actual =
    result.verification?.actual ??
    (result.error instanceof IntegrityError ? result.error.actual : undefined);

  return {
    tool: { name: TOOL_NAME, version: input.toolVersion },
    package: {
      name: descriptor.name,
      version: descriptor.version,
      release: descriptor.release,
      nevr: `${descriptor.name}-${descriptor.version}-${descriptor.release}`,
    },
    ok: result.ok,
    source: {
      archive: result.archivePath,
      algorithm: source.digest.algorithm,
      expected: source.digest.hex,
      ...(actual ? { actual } : {}),
    },
    stages: result.stages.map((stage) => ({
      name: stage.name,
      status: stage.status,
      duration_ms: stage.durationMs,
      ...(stage.detail ? { detail: stage.detail } : {}),
    })),
    files: result.files,
    docs: result.docs,
    ...(result.error ? { error: describeError(result.error) } : {}),
  };
}

export function renderJsonReport(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}

export function describeError(error: Error): ErrorReport {
  if (isPackagingError(error)) {
    return { kind: error.kind, stage: error.stage, message: error.message };
  }
  return { kind: "unknown", stage: null, message: error.message };
}

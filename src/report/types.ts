import type { ErrorKind, StageName } from "../errors/index.js";
import type { StageStatus } from "../pipeline/index.js";

export interface StageReport {
  readonly name: StageName;
  readonly status: StageStatus;
  readonly duration_ms: number;
  readonly detail?: string;
}

export interface ErrorReport {
  readonly kind: ErrorKind | "unknown";
  readonly stage: StageName | null;
  readonly message: string;
}

export interface RunReport {
  readonly tool: { readonly name: string; readonly version: string };
  readonly package: {
    readonly name: string;
    readonly version: string;
    readonly release: string;
    readonly nevr: string;
  };
  readonly ok: boolean;
  readonly source: {
    readonly archive: string;
    readonly algorithm: string;
    readonly expected: string;
    readonly actual?: string;
  };
  readonly stages: readonly StageReport[];
  readonly files: readonly string[];
  readonly docs: readonly string[];
  readonly error?: ErrorReport;
}

import type { BuildConfig } from "../config/index.js";
import type { PackagingError, StageName } from "../errors/index.js";
import type { VerificationResult } from "../integrity/index.js";
import type { Recipe } from "../recipe/index.js";

export const STAGE_ORDER: readonly StageName[] = [
  "prep",
  "build",
  "install",
  "check",
  "files",
  "clean",
];

export type StageStatus = "passed" | "failed" | "skipped";

export interface StageOutcome {
  readonly name: StageName;
  readonly status: StageStatus;
  readonly durationMs: number;
  readonly detail?: string;
}

export type OutputStream = "stdout" | "stderr";

export type PipelineEvent =
  | { readonly type: "stage-start"; readonly stage: StageName }
  | {
      readonly type: "stage-complete";
      readonly stage: StageName;
      readonly durationMs: number;
    }
  | {
      readonly type: "stage-skipped";
      readonly stage: StageName;
      readonly reason: string;
    }
  | {
      readonly type: "stage-failed";
      readonly stage: StageName;
      readonly error: Error;
    }
  | {
      readonly type: "step";
      readonly stage: StageName;
      readonly message: string;
    }
  | {
      readonly type: "output";
      readonly stage: StageName;
      readonly stream: OutputStream;
      readonly chunk: string;
    };

export type PipelineObserver = (event: PipelineEvent) => void;

export interface Fetcher {
  fetch(url: string, destination: string): Promise<void>;
}

export interface Extractor {
  extract(archivePath: string, destination: string): Promise<void>;
}

export interface ToolInvocation {
  readonly stage: StageName;
  readonly script: string;
  readonly cwd: string;
  readonly env: Readonly<Record<string, string>>;
  readonly onOutput?: (stream: OutputStream, chunk: string) => void;
}

export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<void>;
}

export interface PipelineCollaborators {
  readonly fetcher: Fetcher;
  readonly extractor: Extractor;
  readonly runner: ToolRunner;
}

export interface LifecycleInput {
  readonly recipe: Recipe;
  readonly config: BuildConfig;
  readonly collaborators?: Partial<PipelineCollaborators>;
  readonly until?: StageName;
  readonly observer?: PipelineObserver;
}

export interface LifecycleResult {
  readonly ok: boolean;
  readonly stages: readonly StageOutcome[];
  readonly archivePath: string;
  readonly verification?: VerificationResult;
  readonly files: readonly string[];
  readonly docs: readonly string[];
  readonly error?: PackagingError | Error;
}

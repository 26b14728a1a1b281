export { TarExtractor } from "./extractor.js";
export { HttpFetcher } from "./fetcher.js";
export { defaultCollaborators, planRun, runLifecycle } from "./lifecycle.js";
export type { RunLayout } from "./lifecycle.js";
export { ShellToolRunner } from "./tool-runner.js";
export { STAGE_ORDER } from "./types.js";
export type {
  Extractor,
  Fetcher,
  LifecycleInput,
  LifecycleResult,
  OutputStream,
  PipelineCollaborators,
  PipelineEvent,
  PipelineObserver,
  StageOutcome,
  StageStatus,
  ToolInvocation,
  ToolRunner,
} from "./types.js";

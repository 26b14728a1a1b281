import fs from "node:fs/promises";
import path from "node:path";
import {
  IOError,
  ManifestError,
  RecipeError,
  isPackagingError,
  toIOError,
  type PackagingError,
  type StageName,
} from "../errors/index.js";
import {
  assertSourceIntegrity,
  type Result,
  type VerificationResult,
} from "../integrity/index.js";
import { resolveManifest } from "../manifest/index.js";
import {
  createMacroTable,
  expandMacros,
  resolveArchiveName,
  type BuiltinMacro,
  type MacroTable,
  type Recipe,
} from "../recipe/index.js";
import type { BuildConfig } from "../config/index.js";
import { TarExtractor } from "./extractor.js";
import { HttpFetcher } from "./fetcher.js";
import { ShellToolRunner } from "./tool-runner.js";
import {
  STAGE_ORDER,
  type LifecycleInput,
  type LifecycleResult,
  type PipelineCollaborators,
  type PipelineObserver,
  type StageOutcome,
} from "./types.js";

const DEFAULT_UNPACK_DIR = "{{name}}-{{version}}";

export interface RunLayout {
  readonly macros: MacroTable;
  readonly url: string;
  readonly archivePath: string;
  readonly sourceTree: string;
  readonly env: Readonly<Record<string, string>>;
}

interface RunState {
  verification?: VerificationResult;
  files: readonly string[];
  docs: readonly string[];
}

// A stage body returns a reason string when it decides to skip itself.
type StageBody = (state: RunState) => Promise<string | void>;

export function defaultCollaborators(): PipelineCollaborators {
  return {
    fetcher: new HttpFetcher(),
    extractor: new TarExtractor(),
    runner: new ShellToolRunner(),
  };
}

/**
 * Compute every path and macro for a run without touching the filesystem.
 * Throws RecipeError for a macro cycle or an unusable archive name.
 */
export function planRun(recipe: Recipe, config: BuildConfig): RunLayout {
  const { descriptor, source } = recipe;
  const builtins = (builddir: string): Record<BuiltinMacro, string> => ({
    name: descriptor.name,
    version: descriptor.version,
    release: descriptor.release,
    buildroot: config.buildRoot,
    builddir,
    sourcedir: config.sourcesDir,
    optflags: config.optflags,
  });

  const preliminary = createMacroTable(
    builtins(config.buildDir),
    config.macros,
    recipe.macros,
  );
  const unpackDir = expandMacros(
    source.unpack_dir ?? DEFAULT_UNPACK_DIR,
    preliminary,
  );
  const sourceTree = path.resolve(config.buildDir, unpackDir);
  const macros = createMacroTable(
    builtins(sourceTree),
    config.macros,
    recipe.macros,
  );

  const url = expandMacros(source.url, macros);
  const fileName = resolveArchiveName(
    url,
    source.file_name === undefined
      ? undefined
      : expandMacros(source.file_name, macros),
  );

  const env: Record<string, string> = { ...config.env };
  for (const [key, value] of Object.entries(recipe.stages.env)) {
    env[key] = expandMacros(value, macros);
  }

  return {
    macros,
    url,
    archivePath: path.join(config.sourcesDir, fileName),
    sourceTree,
    env,
  };
}

/**
 * Run prep, build, install, check, files and clean in that order, stopping
 * at the first failure or after `until`. Failures are returned in the result,
 * not thrown.
 */
export async function runLifecycle(
  input: LifecycleInput,
): Promise<LifecycleResult> {
  const { recipe, config } = input;
  const collaborators = { ...defaultCollaborators(), ...input.collaborators };
  const notify: PipelineObserver = input.observer ?? (() => undefined);
  const planned = attemptPlan(recipe, config);
  if (!planned.ok) {
    const failure = planned.error;
    notify({ type: "stage-start", stage: "prep" });
    notify({ type: "stage-failed", stage: "prep", error: failure });
    return {
      ok: false,
      stages: STAGE_ORDER.map(
        (stage): StageOutcome =>
          stage === "prep"
            ? { name: stage, status: "failed", durationMs: 0, detail: failure.message }
            : { name: stage, status: "skipped", durationMs: 0, detail: "aborted" },
      ),
      archivePath: config.sourcesDir,
      files: [],
      docs: [],
      error: failure,
    };
  }
  const layout = planned.value;
  const state: RunState = { files: [], docs: [] };

  const runScript = async (stage: StageName, script: string): Promise<void> => {
    await collaborators.runner.run({
      stage,
      script: expandMacros(script, layout.macros),
      cwd: layout.sourceTree,
      env: layout.env,
      onOutput: (stream, chunk) =>
        notify({ type: "output", stage, stream, chunk }),
    });
  };

  const bodies: Record<StageName, StageBody> = {
    prep: async (current) => {
      await fs.mkdir(config.sourcesDir, { recursive: true });
      if (!(await exists(layout.archivePath))) {
        if (!recipe.source.fetch) {
          throw new IOError({
            path: layout.archivePath,
            code: "ENOENT",
            stage: "prep",
            message: `Source fetching is disabled and ${layout.archivePath} is missing`,
          });
        }
        notify({ type: "step", stage: "prep", message: `fetch ${layout.url}` });
        await collaborators.fetcher.fetch(layout.url, layout.archivePath);
      }

      notify({
        type: "step",
        stage: "prep",
        message: `verify ${path.basename(layout.archivePath)}`,
      });
      current.verification = await assertSourceIntegrity({
        archivePath: layout.archivePath,
        expected: recipe.source.digest,
        stage: "prep",
      });

      notify({
        type: "step",
        stage: "prep",
        message: `unpack into ${layout.sourceTree}`,
      });
      await fs.rm(layout.sourceTree, { recursive: true, force: true });
      await fs.mkdir(config.buildDir, { recursive: true });
      await collaborators.extractor.extract(
        layout.archivePath,
        config.buildDir,
      );
      if (!(await exists(layout.sourceTree))) {
        throw new IOError({
          path: layout.sourceTree,
          code: "ENOENT",
          stage: "prep",
          message: `Archive did not unpack into ${layout.sourceTree}; set source.unpack_dir`,
        });
      }
    },
    build: async () => {
      await runScript("build", recipe.stages.build);
    },
    install: async () => {
      await fs.rm(config.buildRoot, { recursive: true, force: true });
      await fs.mkdir(config.buildRoot, { recursive: true });
      await runScript("install", recipe.stages.install);
    },
    check: async () => {
      if (!recipe.stages.check) {
        return "no check script";
      }
      if (!config.runCheck) {
        return "disabled";
      }
      await runScript("check", recipe.stages.check);
    },
    files: async (current) => {
      const expand = (pattern: string): string =>
        expandMacros(pattern, layout.macros);
      const packaged = await resolveManifest(
        config.buildRoot,
        recipe.files.map(expand),
      );
      const docs =
        recipe.docs.length > 0
          ? await resolveManifest(layout.sourceTree, recipe.docs.map(expand))
          : { files: [], unmatched: [] };
      const unmatched = [...packaged.unmatched, ...docs.unmatched];
      if (unmatched.length > 0) {
        throw new ManifestError(unmatched);
      }
      current.files = packaged.files.map((file) => `/${file}`);
      current.docs = docs.files;
    },
    clean: async () => {
      if (config.keepBuildRoot) {
        return "build root kept";
      }
      if (recipe.stages.clean) {
        await runScript("clean", recipe.stages.clean);
        return;
      }
      await fs.rm(config.buildRoot, { recursive: true, force: true });
    },
  };

  const stages: StageOutcome[] = [];
  let failure: PackagingError | undefined;
  let stopped = false;

  for (const stage of STAGE_ORDER) {
    if (failure || stopped) {
      const reason = failure ? "aborted" : "not requested";
      stages.push({ name: stage, status: "skipped", durationMs: 0, detail: reason });
      continue;
    }

    const startedAt = Date.now();
    notify({ type: "stage-start", stage });
    try {
      const skipped = await bodies[stage](state);
      const durationMs = Date.now() - startedAt;
      if (typeof skipped === "string") {
        stages.push({ name: stage, status: "skipped", durationMs, detail: skipped });
        notify({ type: "stage-skipped", stage, reason: skipped });
      } else {
        stages.push({ name: stage, status: "passed", durationMs });
        notify({ type: "stage-complete", stage, durationMs });
      }
    } catch (error) {
      // Bare fs errors from stage housekeeping (mkdir, rm).
      const target = stage === "prep" ? layout.archivePath : layout.sourceTree;
      failure = normalizeError(error, stage, target);
      stages.push({
        name: stage,
        status: "failed",
        durationMs: Date.now() - startedAt,
        detail: failure.message,
      });
      notify({ type: "stage-failed", stage, error: failure });
    }

    if (stage === input.until) {
      stopped = true;
    }
  }

  return {
    ok: !failure,
    stages,
    archivePath: layout.archivePath,
    verification: state.verification,
    files: state.files,
    docs: state.docs,
    error: failure,
  };
}

function attemptPlan(
  recipe: Recipe,
  config: BuildConfig,
): Result<RunLayout, PackagingError> {
  try {
    return { ok: true, value: planRun(recipe, config) };
  } catch (error) {
    return { ok: false, error: normalizeError(error, "prep", config.sourcesDir) };
  }
}

function normalizeError(
  error: unknown,
  stage: StageName,
  target: string,
): PackagingError {
  if (error instanceof RecipeError && error.stage === null) {
    return new RecipeError(error.source, error.problems, stage);
  }
  if (isPackagingError(error)) {
    return error;
  }
  const wrapped = toIOError(error, target, stage);
  if (wrapped instanceof IOError) {
    return wrapped;
  }
  return new IOError({
    path: target,
    stage,
    message: wrapped.message,
    cause: error,
  });
}

async function exists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

import fs from "node:fs/promises";
import {
  loadConfigFile,
  pickInheritedEnv,
  resolveBuildConfig,
  type ConfigOverrides,
} from "../config/index.js";
import type { StageName } from "../errors/index.js";
import {
  runLifecycle,
  type PipelineCollaborators,
  type PipelineObserver,
} from "../pipeline/index.js";
import { loadRecipe } from "../recipe/index.js";
import {
  buildRunReport,
  renderJsonReport,
  renderMarkdownReport,
  type RunReport,
} from "../report/index.js";

export interface BuildOptions extends ConfigOverrides {
  readonly recipe: string;
  readonly config?: string;
  readonly until?: StageName;
  readonly format: "json" | "md";
  readonly out?: string;
  readonly observer?: PipelineObserver;
  readonly collaborators?: Partial<PipelineCollaborators>;
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

export interface BuildResult {
  readonly report: RunReport;
  readonly output: string;
  readonly error?: Error;
}

export async function runBuildCommand(
  options: BuildOptions,
  toolVersion: string,
): Promise<BuildResult> {
  const { recipe } = await loadRecipe(options.recipe);
  const configFile = await loadConfigFile(options.config, options.cwd);
  const config = resolveBuildConfig({
    descriptor: recipe.descriptor,
    file: configFile,
    overrides: {
      optflags: options.optflags,
      workDir: options.workDir,
      sourcesDir: options.sourcesDir,
      buildDir: options.buildDir,
      buildRoot: options.buildRoot,
      runCheck: options.runCheck,
      keepBuildRoot: options.keepBuildRoot,
    },
    baseEnv: pickInheritedEnv(options.env ?? process.env),
    cwd: options.cwd,
  });

  const result = await runLifecycle({
    recipe,
    config,
    collaborators: options.collaborators,
    until: options.until,
    observer: options.observer,
  });

  const report = buildRunReport({ toolVersion, recipe, result });
  const output =
    options.format === "json"
      ? renderJsonReport(report)
      : renderMarkdownReport(report);

  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  return { report, output, error: result.error };
}

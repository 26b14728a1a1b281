#!/usr/bin/env node
import { Command } from "commander";
import type { StageName } from "../errors/index.js";
import { STAGE_ORDER, type PipelineObserver } from "../pipeline/index.js";
import { formatDuration } from "../report/index.js";
import { runBuildCommand } from "./build-command.js";
import { formatDiagnostic } from "./diagnostics.js";
import { runInfoCommand } from "./info-command.js";
import { runLintCommand } from "./lint-command.js";
import { loadVersion } from "./runtime-paths.js";
import { runVerifyCommand } from "./verify-command.js";

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("pkgforge")
  .description("Build packages from YAML recipes behind a source checksum gate")
  .version(toolVersion)
  .option("--verbose", "Echo stage command output")
  .option("--quiet", "Suppress stage progress");

program
  .command("verify")
  .description("Check an archive against its expected digest")
  .argument("<archive>", "Path to the source archive")
  .option("--sha256 <hex>", "Expected SHA-256 digest")
  .option("--sha512 <hex>", "Expected SHA-512 digest")
  .action(async (archive: string, options) => {
    try {
      await runVerifyCommand({
        archive,
        sha256: options.sha256,
        sha512: options.sha512,
      });
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("lint")
  .description("Validate a recipe")
  .argument("<recipe>", "Path to the recipe YAML")
  .option("--config <path>", "Build configuration file")
  .action(async (recipe: string, options) => {
    try {
      const result = await runLintCommand({ recipe, config: options.config });
      await writeStdout(result.output + "\n");
      if (result.errors.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("info")
  .description("Show package metadata and changelog")
  .argument("<recipe>", "Path to the recipe YAML")
  .option("--format <format>", "Output format (json|md)", "md")
  .action(async (recipe: string, options) => {
    try {
      const output = await runInfoCommand({
        recipe,
        format: parseFormat(options.format),
      });
      await writeStdout(output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("build")
  .description("Run prep, build, install, check, files and clean")
  .argument("<recipe>", "Path to the recipe YAML")
  .option("--config <path>", "Build configuration file")
  .option("--work-dir <path>", "Working directory for sources and builds")
  .option("--sources-dir <path>", "Where source archives are stored")
  .option("--build-dir <path>", "Where sources are unpacked")
  .option("--build-root <path>", "Staging directory for the install stage")
  .option("--optflags <flags>", "Compiler flags exposed as {{optflags}}")
  .option("--until <stage>", "Stop after this stage")
  .option("--check", "Run the check stage")
  .option("--keep-build-root", "Do not remove the build root when done")
  .option("--format <format>", "Report format (json|md)", "md")
  .option("--out <file>", "Write report to file")
  .action(async (recipe: string, options) => {
    const globals = program.opts<GlobalOptions>();
    try {
      const result = await runBuildCommand(
        {
          recipe,
          config: options.config,
          workDir: options.workDir,
          sourcesDir: options.sourcesDir,
          buildDir: options.buildDir,
          buildRoot: options.buildRoot,
          optflags: options.optflags,
          until: options.until ? parseStage(options.until) : undefined,
          runCheck: options.check ? true : undefined,
          keepBuildRoot: options.keepBuildRoot ? true : undefined,
          format: parseFormat(options.format),
          out: options.out,
          observer: createProgressObserver(globals),
        },
        toolVersion,
      );

      if (!options.out) {
        await writeStdout(result.output + "\n");
      }
      if (result.error) {
        await writeError(result.error);
        process.exitCode = 1;
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

function parseFormat(value: string): "json" | "md" {
  if (value === "json" || value === "md") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function parseStage(value: string): StageName {
  const stage = STAGE_ORDER.find((name) => name === value);
  if (!stage) {
    throw new Error(
      `Unknown stage: ${value} (expected one of ${STAGE_ORDER.join(", ")})`,
    );
  }
  return stage;
}

function createProgressObserver(options: GlobalOptions): PipelineObserver {
  return (event) => {
    if (event.type === "output") {
      if (options.verbose) {
        process.stderr.write(event.chunk);
      }
      return;
    }
    if (options.quiet) {
      return;
    }
    switch (event.type) {
      case "stage-start":
        process.stderr.write(`==> ${event.stage}\n`);
        break;
      case "step":
        process.stderr.write(`    ${event.message}\n`);
        break;
      case "stage-complete":
        process.stderr.write(
          `<== ${event.stage} (${formatDuration(event.durationMs)})\n`,
        );
        break;
      case "stage-skipped":
        process.stderr.write(`--- ${event.stage} skipped: ${event.reason}\n`);
        break;
      case "stage-failed":
        process.stderr.write(`!!! ${event.stage} failed\n`);
        break;
      default:
        break;
    }
  };
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = formatDiagnostic(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

const argv = [...process.argv];
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

await program.parseAsync(argv);

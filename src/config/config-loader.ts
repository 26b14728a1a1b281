import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { RecipeError, toIOError } from "../errors/index.js";
import { isBuiltinMacro, type PackageDescriptor } from "../recipe/index.js";
import type { BuildConfig, ConfigFile, ConfigOverrides } from "./types.js";

export const DEFAULT_CONFIG_FILE = "pkgforge.yaml";
export const DEFAULT_OPTFLAGS = "-O2 -g";
export const DEFAULT_WORK_DIR = ".pkgforge";
export const INHERITED_ENV_KEYS = ["PATH", "HOME", "LANG"] as const;

const CONFIG_KEYS = new Set([
  "optflags",
  "work_dir",
  "sources_dir",
  "build_dir",
  "build_root",
  "run_check",
  "keep_build_root",
  "macros",
  "env",
]);

export interface ResolveConfigInput {
  readonly descriptor: Pick<PackageDescriptor, "name" | "version" | "release">;
  readonly file?: ConfigFile;
  readonly overrides?: ConfigOverrides;
  readonly baseEnv?: Readonly<Record<string, string>>;
  readonly cwd?: string;
}

export function resolveBuildConfig(input: ResolveConfigInput): BuildConfig {
  const cwd = input.cwd ?? process.cwd();
  const file = input.file ?? {};
  const overrides = input.overrides ?? {};
  const { name, version, release } = input.descriptor;

  const workDir = path.resolve(
    cwd,
    overrides.workDir ?? file.work_dir ?? DEFAULT_WORK_DIR,
  );
  const sourcesDir = path.resolve(
    cwd,
    overrides.sourcesDir ?? file.sources_dir ?? path.join(workDir, "SOURCES"),
  );
  const buildDir = path.resolve(
    cwd,
    overrides.buildDir ?? file.build_dir ?? path.join(workDir, "BUILD"),
  );
  const buildRoot = path.resolve(
    cwd,
    overrides.buildRoot ??
      file.build_root ??
      path.join(workDir, "BUILDROOT", `${name}-${version}-${release}`),
  );

  return {
    optflags: overrides.optflags ?? file.optflags ?? DEFAULT_OPTFLAGS,
    workDir,
    sourcesDir,
    buildDir,
    buildRoot,
    env: { ...(input.baseEnv ?? {}), ...(file.env ?? {}) },
    runCheck: overrides.runCheck ?? file.run_check ?? false,
    keepBuildRoot: overrides.keepBuildRoot ?? file.keep_build_root ?? false,
    macros: { ...(file.macros ?? {}) },
  };
}

export async function loadConfigFile(
  configPath: string | undefined,
  cwd: string = process.cwd(),
): Promise<ConfigFile> {
  const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, "utf8");
  } catch (error) {
    if (
      configPath === undefined &&
      error instanceof Error &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      return {};
    }
    throw toIOError(error, resolved);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw, { filename: resolved });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RecipeError(path.basename(resolved), [
      `YAML parse error: ${message}`,
    ]);
  }
  return validateConfigFile(doc, path.basename(resolved));
}

export function validateConfigFile(
  input: unknown,
  source = DEFAULT_CONFIG_FILE,
): ConfigFile {
  if (input === undefined || input === null) {
    return {};
  }
  const errors: string[] = [];
  if (!isRecord(input)) {
    throw new RecipeError(source, ["config must be a mapping"]);
  }
  for (const key of Object.keys(input)) {
    if (!CONFIG_KEYS.has(key)) {
      errors.push(`config has unknown key '${key}'`);
    }
  }

  const config: ConfigFile = {
    optflags: optionalString(input.optflags, "optflags", errors),
    work_dir: optionalString(input.work_dir, "work_dir", errors),
    sources_dir: optionalString(input.sources_dir, "sources_dir", errors),
    build_dir: optionalString(input.build_dir, "build_dir", errors),
    build_root: optionalString(input.build_root, "build_root", errors),
    run_check: optionalBoolean(input.run_check, "run_check", errors),
    keep_build_root: optionalBoolean(
      input.keep_build_root,
      "keep_build_root",
      errors,
    ),
    macros: optionalStringMap(input.macros, "macros", errors),
    env: optionalStringMap(input.env, "env", errors),
  };

  for (const key of Object.keys(config.macros ?? {})) {
    if (isBuiltinMacro(key)) {
      errors.push(`macros.${key} shadows a built-in macro`);
    }
  }

  if (errors.length > 0) {
    throw new RecipeError(source, errors);
  }
  return config;
}

export function pickInheritedEnv(
  env: NodeJS.ProcessEnv,
): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of INHERITED_ENV_KEYS) {
    const value = env[key];
    if (value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}

function optionalString(
  input: unknown,
  key: string,
  errors: string[],
): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "string") {
    errors.push(`${key} must be a string`);
    return undefined;
  }
  return input;
}

function optionalBoolean(
  input: unknown,
  key: string,
  errors: string[],
): boolean | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "boolean") {
    errors.push(`${key} must be a boolean`);
    return undefined;
  }
  return input;
}

function optionalStringMap(
  input: unknown,
  key: string,
  errors: string[],
): Record<string, string> | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!isRecord(input)) {
    errors.push(`${key} must be a mapping`);
    return undefined;
  }
  const values: Record<string, string> = {};
  for (const [entryKey, value] of Object.entries(input)) {
    if (typeof value === "number" || typeof value === "boolean") {
      values[entryKey] = String(value);
      continue;
    }
    if (typeof value !== "string") {
      errors.push(`${key}.${entryKey} must be a string`);
      continue;
    }
    values[entryKey] = value;
  }
  return values;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

import { RecipeError } from "../errors/index.js";
import {
  parseDigest,
  type Digest,
  type DigestAlgorithm,
} from "../integrity/index.js";
import { checkArchiveName, fileNameFromUrl } from "./archive-name.js";
import { findMacroCycle, isBuiltinMacro } from "./macros.js";
import type {
  ChangelogEntry,
  PackageDescriptor,
  Recipe,
  SourceSpec,
  StageScripts,
} from "./types.js";

const RECIPE_KEYS = new Set([
  "name",
  "version",
  "release",
  "license",
  "summary",
  "url",
  "group",
  "description",
  "requires",
  "build_requires",
  "source",
  "macros",
  "stages",
  "files",
  "docs",
  "changelog",
]);
const SOURCE_KEYS = new Set([
  "url",
  "sha256",
  "sha512",
  "file_name",
  "unpack_dir",
  "fetch",
]);
const STAGE_KEYS = new Set(["build", "install", "check", "clean", "env"]);
const CHANGELOG_KEYS = new Set(["date", "author", "version", "changes"]);
const DIGEST_KEYS: readonly DigestAlgorithm[] = ["sha256", "sha512"];
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;

/**
 * Validate and normalize a parsed recipe document. Every problem is
 * collected before a single RecipeError is thrown.
 */
export function validateRecipe(input: unknown, source = "recipe"): Recipe {
  const errors: string[] = [];
  const recipe = parseRecipe(input, errors);
  if (errors.length > 0 || !recipe) {
    throw new RecipeError(source, errors);
  }
  return recipe;
}

export function collectRecipeErrors(input: unknown): {
  recipe: Recipe | null;
  errors: string[];
} {
  const errors: string[] = [];
  const recipe = parseRecipe(input, errors);
  return { recipe: errors.length > 0 ? null : recipe, errors };
}

function parseRecipe(input: unknown, errors: string[]): Recipe | null {
  if (!isRecord(input)) {
    errors.push("recipe must be a mapping");
    return null;
  }
  assertNoExtraKeys(input, RECIPE_KEYS, "recipe", errors);

  const descriptor = parseDescriptor(input, errors);
  const source = parseSource(input.source, errors);
  const macros = parseMacros(input.macros, errors);
  const stages = parseStages(input.stages, errors);
  const files = parseStringArray(input.files, "files", errors);
  if (input.files !== undefined && files.length === 0) {
    errors.push("files must list at least one pattern");
  } else if (input.files === undefined) {
    errors.push("files is required");
  }
  const docs =
    input.docs === undefined ? [] : parseStringArray(input.docs, "docs", errors);
  const changelog =
    input.changelog === undefined
      ? []
      : parseChangelog(input.changelog, errors);

  if (!source || !stages) {
    return null;
  }

  return {
    descriptor,
    source,
    macros,
    stages,
    files,
    docs,
    changelog,
  };
}

function parseDescriptor(
  input: Record<string, unknown>,
  errors: string[],
): PackageDescriptor {
  const name = requireString(input.name, "name", errors);
  if (name && !NAME_PATTERN.test(name)) {
    errors.push(`name '${name}' contains invalid characters`);
  }
  const version = requireString(input.version, "version", errors);
  if (version.includes("-")) {
    errors.push("version must not contain '-'");
  }
  const release = parseRelease(input.release, errors);
  const license = requireString(input.license, "license", errors);
  const summary = requireString(input.summary, "summary", errors);
  const url = requireString(input.url, "url", errors);
  const group = optionalString(input.group, "group", errors);
  const description = optionalString(
    input.description,
    "description",
    errors,
  );
  const requires =
    input.requires === undefined
      ? []
      : parseStringArray(input.requires, "requires", errors);
  const buildRequires =
    input.build_requires === undefined
      ? []
      : parseStringArray(input.build_requires, "build_requires", errors);

  return {
    name,
    version,
    release,
    license,
    summary,
    url,
    group,
    description: description?.trim(),
    requires,
    build_requires: buildRequires,
  };
}

function parseRelease(input: unknown, errors: string[]): string {
  if (typeof input === "number" && Number.isInteger(input) && input > 0) {
    return String(input);
  }
  if (typeof input === "string" && input.trim().length > 0) {
    if (input.includes("-")) {
      errors.push("release must not contain '-'");
    }
    return input.trim();
  }
  errors.push("release must be a positive integer or a non-empty string");
  return "";
}

function parseSource(input: unknown, errors: string[]): SourceSpec | null {
  if (!isRecord(input)) {
    errors.push("source must be a mapping");
    return null;
  }
  assertNoExtraKeys(input, SOURCE_KEYS, "source", errors);

  const url = requireString(input.url, "source.url", errors);
  const digest = parseSourceDigest(input, errors);
  const fileName = optionalString(input.file_name, "source.file_name", errors);
  if (fileName !== undefined) {
    const problem = checkArchiveName(fileName);
    if (problem) {
      errors.push(`source.file_name ${problem}`);
    }
  } else if (url) {
    const derived = fileNameFromUrl(url);
    if (derived === undefined) {
      errors.push("source.url has no file name; set source.file_name");
    } else if (checkArchiveName(derived)) {
      errors.push(
        `source.url file name '${derived}' is not a bare file name; set source.file_name`,
      );
    }
  }
  const unpackDir = optionalString(
    input.unpack_dir,
    "source.unpack_dir",
    errors,
  );
  const fetch = input.fetch;
  if (fetch !== undefined && typeof fetch !== "boolean") {
    errors.push("source.fetch must be a boolean");
  }

  if (!digest) {
    return null;
  }
  return {
    url,
    digest,
    file_name: fileName,
    unpack_dir: unpackDir,
    fetch: typeof fetch === "boolean" ? fetch : true,
  };
}

function parseSourceDigest(
  input: Record<string, unknown>,
  errors: string[],
): Digest | null {
  const present = DIGEST_KEYS.filter((key) => input[key] !== undefined);
  if (present.length === 0) {
    errors.push("source must declare sha256 or sha512");
    return null;
  }
  if (present.length > 1) {
    errors.push("source must declare only one of sha256 or sha512");
    return null;
  }
  const algorithm = present[0];
  if (!algorithm) {
    return null;
  }
  const value = input[algorithm];
  if (typeof value !== "string") {
    errors.push(`source.${algorithm} must be a string`);
    return null;
  }
  const parsed = parseDigest(algorithm, value);
  if (!parsed.ok) {
    errors.push(`source.${parsed.error.message}`);
    return null;
  }
  return parsed.value;
}

function parseMacros(
  input: unknown,
  errors: string[],
): Record<string, string> {
  if (input === undefined) {
    return {};
  }
  const macros = parseStringMap(input, "macros", errors);
  for (const key of Object.keys(macros)) {
    if (isBuiltinMacro(key)) {
      errors.push(`macros.${key} shadows a built-in macro`);
    }
  }
  const cycle = findMacroCycle(macros);
  if (cycle) {
    errors.push(`macro cycle: ${cycle.join(" -> ")}`);
  }
  return macros;
}

function parseStages(input: unknown, errors: string[]): StageScripts | null {
  if (!isRecord(input)) {
    errors.push("stages must be a mapping");
    return null;
  }
  assertNoExtraKeys(input, STAGE_KEYS, "stages", errors);

  const build = requireString(input.build, "stages.build", errors);
  const install = requireString(input.install, "stages.install", errors);
  const check = optionalString(input.check, "stages.check", errors);
  const clean = optionalString(input.clean, "stages.clean", errors);
  const env =
    input.env === undefined ? {} : parseStringMap(input.env, "stages.env", errors);

  return { build, install, check, clean, env };
}

function parseChangelog(input: unknown, errors: string[]): ChangelogEntry[] {
  if (!Array.isArray(input)) {
    errors.push("changelog must be a list");
    return [];
  }
  const entries: ChangelogEntry[] = [];
  input.forEach((entry: unknown, index) => {
    const entryPath = `changelog[${index}]`;
    if (!isRecord(entry)) {
      errors.push(`${entryPath} must be a mapping`);
      return;
    }
    assertNoExtraKeys(entry, CHANGELOG_KEYS, entryPath, errors);
    const date = parseDate(entry.date, `${entryPath}.date`, errors);
    const author = requireString(entry.author, `${entryPath}.author`, errors);
    const version = requireString(
      entry.version,
      `${entryPath}.version`,
      errors,
    );
    const changes = parseStringArray(
      entry.changes,
      `${entryPath}.changes`,
      errors,
    );
    if (Array.isArray(entry.changes) && changes.length === 0) {
      errors.push(`${entryPath}.changes must not be empty`);
    }
    entries.push({ date, author, version, changes });
  });
  return entries;
}

// js-yaml turns unquoted YYYY-MM-DD into a Date.
function parseDate(input: unknown, path: string, errors: string[]): string {
  if (input instanceof Date && !Number.isNaN(input.getTime())) {
    return input.toISOString().slice(0, 10);
  }
  if (typeof input === "string" && DATE_PATTERN.test(input)) {
    return input;
  }
  errors.push(`${path} must be a YYYY-MM-DD date`);
  return "";
}

function requireString(input: unknown, path: string, errors: string[]): string {
  if (typeof input !== "string" || input.trim().length === 0) {
    errors.push(
      typeof input === "number"
        ? `${path} must be a string (quote numeric values)`
        : `${path} is required`,
    );
    return "";
  }
  return input;
}

function optionalString(
  input: unknown,
  path: string,
  errors: string[],
): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "string") {
    errors.push(`${path} must be a string`);
    return undefined;
  }
  return input;
}

function parseStringArray(
  input: unknown,
  path: string,
  errors: string[],
): string[] {
  if (input === undefined) {
    return [];
  }
  if (!Array.isArray(input)) {
    errors.push(`${path} must be a list`);
    return [];
  }
  const values: string[] = [];
  input.forEach((value: unknown, index) => {
    if (typeof value !== "string" || value.length === 0) {
      errors.push(`${path}[${index}] must be a non-empty string`);
      return;
    }
    values.push(value);
  });
  return values;
}

function parseStringMap(
  input: unknown,
  path: string,
  errors: string[],
): Record<string, string> {
  if (!isRecord(input)) {
    errors.push(`${path} must be a mapping`);
    return {};
  }
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    if (typeof value === "number" || typeof value === "boolean") {
      values[key] = String(value);
      continue;
    }
    if (typeof value !== "string") {
      errors.push(`${path}.${key} must be a string`);
      continue;
    }
    values[key] = value;
  }
  return values;
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  path: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${path} has unknown key '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

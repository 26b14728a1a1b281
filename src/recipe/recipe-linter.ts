import { BUILTIN_MACROS, findTokens } from "./macros.js";
import { collectRecipeErrors } from "./recipe-validator.js";
import type { LintResult, Recipe } from "./types.js";

export interface LintOptions {
  readonly knownMacros?: readonly string[];
}

export function lintRecipeDocument(
  doc: unknown,
  options: LintOptions = {},
): LintResult {
  const { recipe, errors } = collectRecipeErrors(doc);
  if (!recipe) {
    return { errors, warnings: [] };
  }
  return { errors, warnings: collectWarnings(recipe, options) };
}

export function collectWarnings(
  recipe: Recipe,
  options: LintOptions = {},
): string[] {
  const warnings: string[] = [];

  if (recipe.source.url.startsWith("http://")) {
    warnings.push("source.url uses plain http");
  }
  if (recipe.descriptor.url.startsWith("http://")) {
    warnings.push("url uses plain http");
  }

  const known = new Set<string>([
    ...BUILTIN_MACROS,
    ...Object.keys(recipe.macros),
    ...(options.knownMacros ?? []),
  ]);
  for (const [location, template] of templatesOf(recipe)) {
    for (const token of findTokens(template)) {
      if (!known.has(token)) {
        warnings.push(`${location} references unknown macro '{{${token}}}'`);
      }
    }
  }

  warnings.push(...checkChangelog(recipe));
  return warnings;
}

function checkChangelog(recipe: Recipe): string[] {
  const warnings: string[] = [];
  const entries = recipe.changelog;
  for (let i = 1; i < entries.length; i += 1) {
    const newer = entries[i - 1];
    const older = entries[i];
    if (newer && older && older.date > newer.date) {
      warnings.push(
        `changelog[${i}] (${older.date}) is newer than the entry above it`,
      );
    }
  }

  const latest = entries[0];
  const expected = `${recipe.descriptor.version}-${recipe.descriptor.release}`;
  if (latest && latest.version !== expected) {
    warnings.push(
      `latest changelog version ${latest.version} does not match ${expected}`,
    );
  }
  return warnings;
}

function templatesOf(recipe: Recipe): Array<[string, string]> {
  const templates: Array<[string, string]> = [["source.url", recipe.source.url]];
  if (recipe.source.unpack_dir) {
    templates.push(["source.unpack_dir", recipe.source.unpack_dir]);
  }
  for (const [key, value] of Object.entries(recipe.macros)) {
    templates.push([`macros.${key}`, value]);
  }
  const stages = recipe.stages;
  templates.push(["stages.build", stages.build]);
  templates.push(["stages.install", stages.install]);
  if (stages.check) {
    templates.push(["stages.check", stages.check]);
  }
  if (stages.clean) {
    templates.push(["stages.clean", stages.clean]);
  }
  for (const [key, value] of Object.entries(stages.env)) {
    templates.push([`stages.env.${key}`, value]);
  }
  recipe.files.forEach((pattern, index) => {
    templates.push([`files[${index}]`, pattern]);
  });
  recipe.docs.forEach((pattern, index) => {
    templates.push([`docs[${index}]`, pattern]);
  });
  return templates;
}

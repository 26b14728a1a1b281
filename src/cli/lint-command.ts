import path from "node:path";
import { loadConfigFile } from "../config/index.js";
import {
  lintRecipeDocument,
  readRecipeDocument,
  type LintResult,
} from "../recipe/index.js";

export interface LintOptions {
  readonly recipe: string;
  readonly config?: string;
  readonly cwd?: string;
}

export interface LintOutcome extends LintResult {
  readonly output: string;
}

export async function runLintCommand(
  options: LintOptions,
): Promise<LintOutcome> {
  const doc = await readRecipeDocument(path.resolve(options.recipe));
  const configFile = await loadConfigFile(options.config, options.cwd);
  const result = lintRecipeDocument(doc, {
    knownMacros: Object.keys(configFile.macros ?? {}),
  });
  return { ...result, output: renderLint(options.recipe, result) };
}

function renderLint(recipePath: string, result: LintResult): string {
  const lines: string[] = [];
  for (const error of result.errors) {
    lines.push(`error: ${error}`);
  }
  for (const warning of result.warnings) {
    lines.push(`warning: ${warning}`);
  }
  const name = path.basename(recipePath);
  lines.push(
    `${name}: ${result.errors.length} error(s), ${result.warnings.length} warning(s)`,
  );
  return lines.join("\n");
}

import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { RecipeError, toIOError } from "../errors/index.js";
import { validateRecipe } from "./recipe-validator.js";
import type { Recipe } from "./types.js";

export interface LoadedRecipe {
  readonly recipe: Recipe;
  readonly recipePath: string;
}

export async function loadRecipe(recipePath: string): Promise<LoadedRecipe> {
  const resolved = path.resolve(recipePath);
  const doc = await readRecipeDocument(resolved);
  const recipe = validateRecipe(doc, path.basename(resolved));
  return { recipe, recipePath: resolved };
}

export async function readRecipeDocument(recipePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(recipePath, "utf8");
  } catch (error) {
    throw toIOError(error, recipePath);
  }
  try {
    return yaml.load(raw, { filename: recipePath });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RecipeError(path.basename(recipePath), [
      `YAML parse error: ${message}`,
    ]);
  }
}

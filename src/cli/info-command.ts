import { loadRecipe } from "../recipe/index.js";
import { renderRecipeInfo } from "../report/index.js";

export interface InfoOptions {
  readonly recipe: string;
  readonly format: "json" | "md";
}

export async function runInfoCommand(options: InfoOptions): Promise<string> {
  const { recipe } = await loadRecipe(options.recipe);
  if (options.format === "md") {
    return renderRecipeInfo(recipe);
  }
  return JSON.stringify(
    {
      ...recipe.descriptor,
      source: {
        url: recipe.source.url,
        [recipe.source.digest.algorithm]: recipe.source.digest.hex,
      },
      files: recipe.files,
      docs: recipe.docs,
      changelog: recipe.changelog,
    },
    null,
    2,
  );
}

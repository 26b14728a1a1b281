export {
  checkArchiveName,
  fileNameFromUrl,
  resolveArchiveName,
} from "./archive-name.js";
export {
  BUILTIN_MACROS,
  createMacroTable,
  expandMacros,
  findMacroCycle,
  findTokens,
  isBuiltinMacro,
} from "./macros.js";
export type { BuiltinMacro, MacroTable } from "./macros.js";
export { loadRecipe, readRecipeDocument } from "./recipe-loader.js";
export type { LoadedRecipe } from "./recipe-loader.js";
export { collectWarnings, lintRecipeDocument } from "./recipe-linter.js";
export { collectRecipeErrors, validateRecipe } from "./recipe-validator.js";
export type {
  ChangelogEntry,
  LintResult,
  PackageDescriptor,
  Recipe,
  SourceSpec,
  StageScripts,
} from "./types.js";

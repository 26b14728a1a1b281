export {
  ExternalToolError,
  FetchError,
  IOError,
  IntegrityError,
  ManifestError,
  PackagingError,
  RecipeError,
  isPackagingError,
  toIOError,
} from "./packaging-errors.js";
export type { ErrorKind, StageName } from "./packaging-errors.js";

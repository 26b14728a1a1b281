import { RecipeError } from "../errors/index.js";

export function fileNameFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const segments = pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  if (!last) {
    return undefined;
  }
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

// Archives are written as `<sourcesDir>/<name>`, so the name must not leave it.
export function checkArchiveName(name: string): string | undefined {
  const unsafe =
    name === "" ||
    name === "." ||
    name === ".." ||
    name.includes("/") ||
    name.includes("\\");
  return unsafe ? "must be a bare file name" : undefined;
}

/**
 * Pick the archive file name from an expanded `file_name`, or else from the
 * download URL. Throws RecipeError when neither yields a safe name.
 */
export function resolveArchiveName(url: string, fileName?: string): string {
  const field = fileName === undefined ? "source.url" : "source.file_name";
  const name = fileName ?? fileNameFromUrl(url);
  if (name === undefined) {
    throw new RecipeError("source", [
      `cannot derive a file name from ${url}; set source.file_name`,
    ]);
  }
  const problem = checkArchiveName(name);
  if (problem) {
    throw new RecipeError("source", [`${field} ${problem} (got '${name}')`]);
  }
  return name;
}

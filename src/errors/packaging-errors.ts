export type StageName =
  | "prep"
  | "build"
  | "install"
  | "check"
  | "files"
  | "clean";

export type ErrorKind =
  | "integrity"
  | "io"
  | "external-tool"
  | "fetch"
  | "manifest"
  | "recipe";

/**
 * Base class for every failure that aborts a packaging run. `stage` is the
 * lifecycle stage that was running, or null outside the lifecycle
 * (standalone `verify`, `lint`).
 */
export abstract class PackagingError extends Error {
  abstract readonly kind: ErrorKind;
  readonly stage: StageName | null;

  protected constructor(
    message: string,
    stage: StageName | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class IntegrityError extends PackagingError {
  readonly kind = "integrity";
  readonly archivePath: string;
  readonly expected: string;
  readonly actual: string;

  constructor(input: {
    archivePath: string;
    expected: string;
    actual: string;
    stage?: StageName | null;
  }) {
    super(`invalid checksum for ${input.archivePath}`, input.stage ?? null);
    this.archivePath = input.archivePath;
    this.expected = input.expected;
    this.actual = input.actual;
  }
}

export class IOError extends PackagingError {
  readonly kind = "io";
  readonly path: string;
  readonly code: string | undefined;

  constructor(input: {
    path: string;
    message: string;
    code?: string;
    stage?: StageName | null;
    cause?: unknown;
  }) {
    super(input.message, input.stage ?? null, { cause: input.cause });
    this.path = input.path;
    this.code = input.code;
  }
}

export class ExternalToolError extends PackagingError {
  readonly kind = "external-tool";
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(input: {
    stage: StageName;
    command: string;
    exitCode: number | null;
    signal?: string | null;
    stderr?: string;
    cause?: unknown;
  }) {
    let status = `exited with status ${input.exitCode}`;
    if (input.exitCode === null) {
      status = input.signal
        ? `was killed by ${input.signal}`
        : "could not be started";
    }
    super(`${input.command} ${status}`, input.stage, { cause: input.cause });
    this.command = input.command;
    this.exitCode = input.exitCode;
    this.stderr = input.stderr ?? "";
  }
}

export class FetchError extends PackagingError {
  readonly kind = "fetch";
  readonly url: string;
  readonly status: number | null;

  constructor(input: {
    url: string;
    status: number | null;
    message: string;
    cause?: unknown;
  }) {
    super(input.message, "prep", { cause: input.cause });
    this.url = input.url;
    this.status = input.status;
  }
}

export class ManifestError extends PackagingError {
  readonly kind = "manifest";
  readonly unmatched: readonly string[];

  constructor(unmatched: readonly string[]) {
    super(`File not found: ${unmatched.join(", ")}`, "files");
    this.unmatched = unmatched;
  }
}

export class RecipeError extends PackagingError {
  readonly kind = "recipe";
  readonly source: string;
  readonly problems: readonly string[];

  constructor(
    source: string,
    problems: readonly string[],
    stage: StageName | null = null,
  ) {
    super(`Invalid ${source}: ${problems.join("; ")}`, stage);
    this.source = source;
    this.problems = problems;
  }
}

export function isPackagingError(error: unknown): error is PackagingError {
  return error instanceof PackagingError;
}

export function toIOError(
  error: unknown,
  filePath: string,
  stage: StageName | null = null,
): IOError | Error {
  if (error instanceof IOError) {
    return error;
  }
  if (error instanceof Error && "code" in error) {
    const code = typeof error.code === "string" ? error.code : undefined;
    return new IOError({
      path: filePath,
      code,
      stage,
      message: describeFsError(code, filePath),
      cause: error,
    });
  }
  return error instanceof Error ? error : new Error(String(error));
}

function describeFsError(code: string | undefined, filePath: string): string {
  switch (code) {
    case "ENOENT":
      return `No such file: ${filePath}`;
    case "EACCES":
    case "EPERM":
      return `Permission denied: ${filePath}`;
    case "EISDIR":
      return `Expected a file but found a directory: ${filePath}`;
    default:
      return `Unable to read ${filePath}${code ? ` (${code})` : ""}`;
  }
}

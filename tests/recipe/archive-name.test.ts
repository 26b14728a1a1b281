import { describe, expect, it } from "vitest";
import { RecipeError } from "../../src/errors/index.js";
import {
  checkArchiveName,
  fileNameFromUrl,
  resolveArchiveName,
} from "../../src/recipe/index.js";

describe("archive names", () => {
  it("takes the last decoded path segment of the URL", () => {
    expect(
      fileNameFromUrl("https://example.com/releases/demo-1.0.tar.gz?raw=1"),
    ).toBe("demo-1.0.tar.gz");
    expect(fileNameFromUrl("https://example.com/demo%201.0.tar.gz")).toBe(
      "demo 1.0.tar.gz",
    );
    expect(fileNameFromUrl("https://example.com/")).toBeUndefined();
  });

  it("rejects names that leave the sources directory", () => {
    expect(checkArchiveName("demo-1.0.tar.gz")).toBeUndefined();
    for (const name of ["", ".", "..", "../demo.tar.gz", "a\\b.tar.gz"]) {
      expect(checkArchiveName(name)).toBe("must be a bare file name");
    }
  });

  it("prefers an explicit file name over the URL", () => {
    expect(
      resolveArchiveName("https://example.com/v1.0.tar.gz", "demo-1.0.tar.gz"),
    ).toBe("demo-1.0.tar.gz");
  });

  it("refuses a URL whose encoded name escapes the directory", () => {
    const error = (() => {
      try {
        return resolveArchiveName("https://example.com/..%2F..%2Fescaped.tar.gz");
      } catch (reason: unknown) {
        return reason;
      }
    })();

    expect(error).toBeInstanceOf(RecipeError);
    expect(error instanceof Error && error.message).toBe(
      "Invalid source: source.url must be a bare file name (got '../../escaped.tar.gz')",
    );
  });

  it("refuses a URL without a file name", () => {
    expect(() => resolveArchiveName("https://example.com/")).toThrow(
      "Invalid source: cannot derive a file name from https://example.com/; set source.file_name",
    );
  });
});

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IOError, RecipeError } from "../../src/errors/index.js";
import {
  lintRecipeDocument,
  loadRecipe,
  validateRecipe,
} from "../../src/recipe/index.js";

const SHA = "a".repeat(64);
const repoRoot = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
);

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pkgforge-recipe-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

function baseDoc(): Record<string, unknown> {
  return {
    name: "demo",
    version: "1.0",
    release: 1,
    license: "MIT",
    summary: "Demo package",
    url: "https://example.com/demo",
    source: {
      url: "https://example.com/demo-{{version}}.tar.gz",
      sha256: SHA,
    },
    stages: {
      build: "make",
      install: "make install DESTDIR={{buildroot}}",
    },
    files: ["/usr/bin/demo"],
  };
}

function problemsOf(doc: unknown): readonly string[] {
  try {
    validateRecipe(doc);
  } catch (error) {
    if (error instanceof RecipeError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe("recipe validation", () => {
  it("normalizes a minimal recipe", () => {
    const recipe = validateRecipe(baseDoc());
    expect(recipe.descriptor.name).toBe("demo");
    expect(recipe.descriptor.release).toBe("1");
    expect(recipe.descriptor.requires).toEqual([]);
    expect(recipe.source.fetch).toBe(true);
    expect(recipe.source.digest.hex).toBe(SHA);
    expect(recipe.stages.env).toEqual({});
    expect(recipe.docs).toEqual([]);
    expect(recipe.changelog).toEqual([]);
  });

  it("rejects a 65 character sha256 instead of comparing it", () => {
    const doc = baseDoc();
    doc.source = { url: "https://example.com/demo.tar.gz", sha256: `${SHA}b` };
    expect(problemsOf(doc)).toEqual([
      "source.sha256 digest must be 64 hex characters (got 65)",
    ]);
  });

  it("requires exactly one digest", () => {
    const neither = baseDoc();
    neither.source = { url: "https://example.com/demo.tar.gz" };
    expect(problemsOf(neither)).toEqual([
      "source must declare sha256 or sha512",
    ]);

    const both = baseDoc();
    both.source = {
      url: "https://example.com/demo.tar.gz",
      sha256: SHA,
      sha512: "b".repeat(128),
    };
    expect(problemsOf(both)).toEqual([
      "source must declare only one of sha256 or sha512",
    ]);
  });

  it("collects every problem at once", () => {
    const doc = baseDoc();
    delete doc.license;
    doc.version = 3;
    doc.stages = { build: "make" };
    doc.files = [];
    doc.extra = true;

    expect(problemsOf(doc)).toEqual([
      "recipe has unknown key 'extra'",
      "version must be a string (quote numeric values)",
      "license is required",
      "stages.install is required",
      "files must list at least one pattern",
    ]);
  });

  it("requires a safe archive file name", () => {
    const bare = baseDoc();
    bare.source = { url: "https://example.com/", sha256: SHA };
    expect(problemsOf(bare)).toEqual([
      "source.url has no file name; set source.file_name",
    ]);

    const encoded = baseDoc();
    encoded.source = {
      url: "https://example.com/..%2F..%2Fescaped.tar.gz",
      sha256: SHA,
    };
    expect(problemsOf(encoded)).toEqual([
      "source.url file name '../../escaped.tar.gz' is not a bare file name; set source.file_name",
    ]);

    const named = baseDoc();
    named.source = {
      url: "https://example.com/",
      sha256: SHA,
      file_name: "..",
    };
    expect(problemsOf(named)).toEqual([
      "source.file_name must be a bare file name",
    ]);
  });

  it("rejects macros that shadow built-ins or form a cycle", () => {
    const doc = baseDoc();
    doc.macros = { version: "2.0", a: "{{b}}", b: "{{a}}" };
    expect(problemsOf(doc)).toEqual([
      "macros.version shadows a built-in macro",
      "macro cycle: a -> b -> a",
    ]);
  });

  it("parses changelog dates written as YAML timestamps", () => {
    const doc = baseDoc();
    doc.changelog = [
      {
        date: new Date("2024-03-01T00:00:00Z"),
        author: "Maintainer <maintainer@example.com>",
        version: "1.0-1",
        changes: ["initial package"],
      },
    ];
    const recipe = validateRecipe(doc);
    expect(recipe.changelog[0]?.date).toBe("2024-03-01");
  });
});

describe("recipe lint", () => {
  it("warns about unknown macros and changelog drift", () => {
    const doc = baseDoc();
    doc.stages = {
      build: "make CFLAGS='{{optflags}}' {{jobs}}",
      install: "make install DESTDIR={{buildroot}}",
    };
    doc.changelog = [
      {
        date: "2024-01-01",
        author: "Maintainer",
        version: "0.9-1",
        changes: ["older"],
      },
      {
        date: "2024-02-01",
        author: "Maintainer",
        version: "1.0-1",
        changes: ["newer"],
      },
    ];

    const result = lintRecipeDocument(doc);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([
      "stages.build references unknown macro '{{jobs}}'",
      "changelog[1] (2024-02-01) is newer than the entry above it",
      "latest changelog version 0.9-1 does not match 1.0-1",
    ]);
  });

  it("accepts macros supplied by the build configuration", () => {
    const doc = baseDoc();
    doc.files = ["{{bindir}}/demo"];
    expect(lintRecipeDocument(doc).warnings).toEqual([
      "files[0] references unknown macro '{{bindir}}'",
    ]);
    expect(
      lintRecipeDocument(doc, { knownMacros: ["bindir"] }).warnings,
    ).toEqual([]);
  });

  it("reports a source URL without a file name as an error", () => {
    const doc = baseDoc();
    doc.source = { url: "https://example.com/", sha256: SHA };
    expect(lintRecipeDocument(doc)).toEqual({
      errors: ["source.url has no file name; set source.file_name"],
      warnings: [],
    });
  });

  it("returns errors without warnings for an invalid recipe", () => {
    const result = lintRecipeDocument({ name: "demo" });
    expect(result.errors.length).toBeGreaterThan(0);
    expect(result.warnings).toEqual([]);
  });
});

describe("recipe loading", () => {
  it("loads the bundled Cython recipe", async () => {
    const { recipe } = await loadRecipe(
      path.join(repoRoot, "recipes", "python3-cython.yaml"),
    );
    expect(recipe.descriptor.name).toBe("python3-Cython");
    expect(recipe.descriptor.version).toBe("3.0.6");
    expect(recipe.descriptor.build_requires).toEqual([
      "python3-devel",
      "python3-setuptools",
      "gcc",
    ]);
    expect(recipe.source.digest.hex).toBe(
      "79d1b2f9e4d94c9d1e306d2d8ddef6759fa933363f8a90fa3be7b500db0287d9",
    );
    expect(recipe.changelog[0]?.date).toBe("2023-11-26");
  });

  it("lints the bundled recipe with only the plain http warning", async () => {
    const raw = await fs.readFile(
      path.join(repoRoot, "recipes", "python3-cython.yaml"),
      "utf8",
    );
    const result = lintRecipeDocument(yaml.load(raw));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["url uses plain http"]);
  });

  it("reports a missing recipe as IOError", async () => {
    await expect(
      loadRecipe(path.join(tempDir, "missing.yaml")),
    ).rejects.toBeInstanceOf(IOError);
  });

  it("reports malformed YAML as RecipeError", async () => {
    const recipePath = path.join(tempDir, "broken.yaml");
    await fs.writeFile(recipePath, "name: [unclosed\n", "utf8");
    await expect(loadRecipe(recipePath)).rejects.toBeInstanceOf(RecipeError);
  });
});

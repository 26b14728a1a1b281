import fs from "node:fs/promises";
import path from "node:path";
import { toIOError } from "../errors/index.js";
import type { ManifestEntry, ManifestResolution } from "./types.js";

interface CompiledPattern {
  readonly raw: string;
  readonly regex: RegExp;
}

export async function resolveManifest(
  rootPath: string,
  patterns: readonly string[],
): Promise<ManifestResolution> {
  const entries = await listEntries(rootPath);
  const files = new Set<string>();
  const unmatched: string[] = [];

  for (const pattern of patterns.map(compilePattern)) {
    const matched = entries.filter((entry) =>
      pattern.regex.test(entry.relativePath),
    );
    if (matched.length === 0) {
      unmatched.push(pattern.raw);
      continue;
    }
    for (const entry of matched) {
      if (!entry.isDirectory) {
        files.add(entry.relativePath);
        continue;
      }
      const prefix = `${entry.relativePath}/`;
      for (const nested of entries) {
        if (!nested.isDirectory && nested.relativePath.startsWith(prefix)) {
          files.add(nested.relativePath);
        }
      }
    }
  }

  return {
    files: [...files].sort((a, b) => a.localeCompare(b)),
    unmatched,
  };
}

export async function listEntries(rootPath: string): Promise<ManifestEntry[]> {
  const entries: ManifestEntry[] = [];
  try {
    await walkDirectory(rootPath, rootPath, entries);
  } catch (error) {
    throw toIOError(error, rootPath, "files");
  }
  entries.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return entries;
}

async function walkDirectory(
  rootPath: string,
  currentPath: string,
  entries: ManifestEntry[],
): Promise<void> {
  const dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  dirEntries.sort((a, b) => a.name.localeCompare(b.name));

  for (const dirent of dirEntries) {
    const absolutePath = path.join(currentPath, dirent.name);
    const relativePath = toRelativePosix(rootPath, absolutePath);

    // Links are packaged as links, never followed.
    if (dirent.isDirectory() && !dirent.isSymbolicLink()) {
      entries.push({ relativePath, isDirectory: true });
      await walkDirectory(rootPath, absolutePath, entries);
      continue;
    }

    entries.push({ relativePath, isDirectory: false });
  }
}

export function compilePattern(raw: string): CompiledPattern {
  const trimmed = raw.replace(/^\/+/, "").replace(/\/+$/, "");
  return { raw, regex: new RegExp(`^${globToRegexSource(trimmed)}$`) };
}

function globToRegexSource(pattern: string): string {
  let regex = "";
  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    if (!char) {
      continue;
    }
    if (char === "*") {
      const next = pattern[i + 1];
      if (next === "*") {
        regex += ".*";
        i += 1;
      } else {
        regex += "[^/]*";
      }
      continue;
    }

    if (char === "?") {
      regex += "[^/]";
      continue;
    }

    regex += escapeRegex(char);
  }
  return regex;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

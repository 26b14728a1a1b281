import type { Digest } from "../integrity/index.js";

export interface PackageDescriptor {
  readonly name: string;
  readonly version: string;
  readonly release: string;
  readonly license: string;
  readonly summary: string;
  readonly url: string;
  readonly group?: string;
  readonly description?: string;
  readonly requires: readonly string[];
  readonly build_requires: readonly string[];
}

export interface SourceSpec {
  readonly url: string;
  readonly digest: Digest;
  readonly file_name?: string;
  readonly unpack_dir?: string;
  readonly fetch: boolean;
}

export interface StageScripts {
  readonly build: string;
  readonly install: string;
  readonly check?: string;
  readonly clean?: string;
  readonly env: Readonly<Record<string, string>>;
}

export interface ChangelogEntry {
  readonly date: string;
  readonly author: string;
  readonly version: string;
  readonly changes: readonly string[];
}

export interface Recipe {
  readonly descriptor: PackageDescriptor;
  readonly source: SourceSpec;
  readonly macros: Readonly<Record<string, string>>;
  readonly stages: StageScripts;
  readonly files: readonly string[];
  readonly docs: readonly string[];
  readonly changelog: readonly ChangelogEntry[];
}

export interface LintResult {
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

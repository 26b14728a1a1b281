export interface ManifestEntry {
  readonly relativePath: string;
  readonly isDirectory: boolean;
}

export interface ManifestResolution {
  readonly files: readonly string[];
  readonly unmatched: readonly string[];
}

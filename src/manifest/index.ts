export { compilePattern, listEntries, resolveManifest } from "./file-manifest.js";
export type { ManifestEntry, ManifestResolution } from "./types.js";

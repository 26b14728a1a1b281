import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export async function resolvePackageRoot(
  startDir: string = path.dirname(fileURLToPath(import.meta.url)),
): Promise<string> {
  let current = startDir;
  for (;;) {
    if (await existsFile(path.join(current, "package.json"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new Error(`Unable to find package.json above ${startDir}`);
    }
    current = parent;
  }
}

export async function loadVersion(): Promise<string> {
  const root = await resolvePackageRoot();
  const raw = await fs.readFile(path.join(root, "package.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (
    typeof json === "object" &&
    json !== null &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}

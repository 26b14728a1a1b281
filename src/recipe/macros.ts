import { RecipeError } from "../errors/index.js";

export const BUILTIN_MACROS = [
  "name",
  "version",
  "release",
  "buildroot",
  "builddir",
  "sourcedir",
  "optflags",
] as const;

export type BuiltinMacro = (typeof BUILTIN_MACROS)[number];

export type MacroTable = ReadonlyMap<string, string>;

const TOKEN_PATTERN = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;
const MAX_DEPTH = 16;

export function isBuiltinMacro(name: string): name is BuiltinMacro {
  return BUILTIN_MACROS.some((macro) => macro === name);
}

export function findTokens(template: string): string[] {
  const tokens: string[] = [];
  for (const match of template.matchAll(TOKEN_PATTERN)) {
    const key = match[1];
    if (key && !tokens.includes(key)) {
      tokens.push(key);
    }
  }
  return tokens;
}

export function expandMacros(template: string, table: MacroTable): string {
  return template.replace(TOKEN_PATTERN, (match, key: string) => {
    return table.get(key) ?? match;
  });
}

/**
 * Build the lookup table for one run. `layers` are applied in order, so a
 * later layer overrides an earlier one; built-ins can never be overridden.
 * Macro values may reference any other macro.
 */
export function createMacroTable(
  builtins: Readonly<Record<BuiltinMacro, string>>,
  ...layers: ReadonlyArray<Readonly<Record<string, string>>>
): MacroTable {
  const raw = new Map<string, string>();
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (!isBuiltinMacro(key)) {
        raw.set(key, value);
      }
    }
  }

  const cycle = findMacroCycle(Object.fromEntries(raw));
  if (cycle) {
    throw new RecipeError("macros", [
      `macro cycle: ${cycle.join(" -> ")}`,
    ]);
  }

  const table = new Map<string, string>(Object.entries(builtins));
  const resolve = (key: string, depth: number): string => {
    const resolved = table.get(key);
    if (resolved !== undefined) {
      return resolved;
    }
    const value = raw.get(key) ?? "";
    if (depth > MAX_DEPTH) {
      throw new RecipeError("macros", [`macro ${key} nests too deeply`]);
    }
    const expanded = value.replace(TOKEN_PATTERN, (match, inner: string) => {
      if (table.has(inner) || raw.has(inner)) {
        return resolve(inner, depth + 1);
      }
      return match;
    });
    table.set(key, expanded);
    return expanded;
  };

  for (const key of raw.keys()) {
    resolve(key, 0);
  }
  return table;
}

export function findMacroCycle(
  macros: Readonly<Record<string, string>>,
): string[] | null {
  const names = new Set(Object.keys(macros));
  const done = new Set<string>();

  const visit = (name: string, trail: string[]): string[] | null => {
    if (trail.includes(name)) {
      return [...trail.slice(trail.indexOf(name)), name];
    }
    if (done.has(name)) {
      return null;
    }
    const value = macros[name] ?? "";
    for (const token of findTokens(value)) {
      if (!names.has(token)) {
        continue;
      }
      const cycle = visit(token, [...trail, name]);
      if (cycle) {
        return cycle;
      }
    }
    done.add(name);
    return null;
  };

  for (const name of [...names].sort()) {
    const cycle = visit(name, []);
    if (cycle) {
      return cycle;
    }
  }
  return null;
}

/**
 * Built-in discipline profiles shipped as JSON under config/disciplines/.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { loadDisciplineProfile, DisciplineProfileError } from "./loader.js";
import type { DisciplineProfile } from "./schema.js";

/** Directory holding the built-in profiles, resolved from this module. */
export const BUILTIN_PROFILE_DIR = fileURLToPath(
  new URL("../../../config/disciplines/", import.meta.url)
);

/**
 * Slugs of every built-in profile, sorted.
 */
export function listBuiltinProfiles(dir: string = BUILTIN_PROFILE_DIR): string[] {
  if (!existsSync(dir)) {
    return [];
  }
  return readdirSync(dir)
    .filter((name) => name.endsWith(".json"))
    .map((name) => name.slice(0, -".json".length))
    .sort();
}

/**
 * Read and validate a profile file.
 *
 * @throws DisciplineProfileError if the file is missing, not JSON, or invalid
 */
export function loadDisciplineProfileFile(path: string): Readonly<DisciplineProfile> {
  if (!existsSync(path)) {
    throw new DisciplineProfileError(`Profile file not found: ${path}`, []);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new DisciplineProfileError(
      `Failed to parse profile JSON at ${path}: ${err instanceof Error ? err.message : String(err)}`,
      []
    );
  }

  return loadDisciplineProfile(parsed);
}

/**
 * Load a built-in profile by slug (e.g. "physics").
 */
export function loadBuiltinProfile(
  slug: string,
  dir: string = BUILTIN_PROFILE_DIR
): Readonly<DisciplineProfile> {
  const known = listBuiltinProfiles(dir);
  if (!known.includes(slug)) {
    throw new DisciplineProfileError(
      `Unknown discipline "${slug}". Built-in profiles: ${known.join(", ") || "(none)"}`,
      []
    );
  }
  return loadDisciplineProfileFile(join(dir, `${slug}.json`));
}

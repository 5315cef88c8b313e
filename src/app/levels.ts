import { readFile, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";

import { parseLevelJson } from "../engine/level/json";
import { describeLoadError } from "../engine/level/loader";
import { debugLog } from "../utils/debug";

import type { LevelSource } from "../engine/level/types";

// Shipped campaign, next to src/ and dist/ alike
export const BUNDLED_LEVELS_DIR = resolve(__dirname, "../../levels");

/**
 * Read every `*.json` level in a directory, ordered by file name.
 * Throws on the first file that is not a valid level.
 */
export async function loadLevelDirectory(
  dir: string = BUNDLED_LEVELS_DIR,
): Promise<ReadonlyArray<LevelSource>> {
  const names = (await readdir(dir))
    .filter((name) => name.endsWith(".json"))
    .sort();

  const levels: Array<LevelSource> = [];
  for (const name of names) {
    const parsed = parseLevelJson(await readFile(join(dir, name), "utf8"));
    if (!parsed.ok) {
      throw new Error(`${name}: ${describeLoadError(parsed.error)}`);
    }
    levels.push(parsed.source);
  }
  debugLog("level", `Read ${String(levels.length)} levels from ${dir}`);
  return levels;
}

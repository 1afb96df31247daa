import path from "node:path";
import { exists } from "tdd-guard-hook";

/**
 * Walk up from `start` to the first directory holding any of `markers`.
 * Markers are checked in order within one directory.
 */
export async function findProjectRoot(start: string, markers: readonly string[]): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    for (const marker of markers) {
      if (await exists(path.join(dir, marker))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

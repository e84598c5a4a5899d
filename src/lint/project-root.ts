import { dirname, join } from "path";
import { pathExists, sanitizePath } from "../utils/fs";

export const MAX_ROOT_ASCENTS = 10;

/**
 * Walks up from the file's directory and returns the first directory that
 * directly contains one of `markers`. Gives up after `maxAscents` steps
 * upward or at the filesystem root.
 */
export async function findProjectRoot(
  filePath: string,
  markers: readonly string[],
  maxAscents = MAX_ROOT_ASCENTS
): Promise<string | null> {
  if (!markers.length) return null;

  let dir = dirname(sanitizePath(filePath));

  for (let ascents = 0; ; ascents++) {
    for (const marker of markers) {
      if (await pathExists(join(dir, marker))) {
        return dir;
      }
    }

    const parent = dirname(dir);
    if (parent === dir || ascents >= maxAscents) {
      return null;
    }
    dir = parent;
  }
}

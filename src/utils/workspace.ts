import { access, constants } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

export const PROJECT_MARKERS = ['.git', 'package.json'] as const;

async function exists(path: string): Promise<boolean> {
  return access(path, constants.F_OK).then(() => true, () => false);
}

/**
 * Walk up from `startDir` to the nearest directory holding one of `markers`.
 * Falls back to `startDir` when none is found.
 */
export async function findProjectRoot(
  startDir: string = process.cwd(),
  markers: readonly string[] = PROJECT_MARKERS
): Promise<string> {
  const start = resolve(startDir);
  let dir = start;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    for (const marker of markers) {
      if (await exists(join(dir, marker))) return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return start;
    }
    dir = parent;
  }
}

/**
 * The default PathBoundary root when none is configured.
 */
export async function getWorkspaceRoot(cwd: string = process.cwd()): Promise<string> {
  return findProjectRoot(cwd);
}

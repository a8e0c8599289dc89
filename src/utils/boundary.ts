import { realpath, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { CodeuError, errnoCode } from './errors.js';

/**
 * True if `child` is `parent` or lies beneath it. Both must be absolute.
 */
export function isWithinDir(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** POSIX-style form of a relative path, `.` for the root itself. */
export function toPosix(relPath: string): string {
  if (relPath === '') return '.';
  return sep === '/' ? relPath : relPath.split(sep).join('/');
}

/**
 * Root directory beyond which no tool may read or write.
 *
 * A path is inside when it is lexically under the root AND the real path of
 * its deepest existing ancestor is under the real root, so a symlink inside
 * the workspace cannot point a tool outside of it.
 */
export class PathBoundary {
  private constructor(
    readonly root: string,
    readonly realRoot: string
  ) {}

  static async open(root: string): Promise<PathBoundary> {
    const absolute = resolve(root);
    let info: Stats;
    try {
      info = await stat(absolute);
    } catch (err) {
      throw new CodeuError(`Workspace root not found: ${absolute}`, 'CONFIG_INVALID', { cause: err });
    }
    if (!info.isDirectory()) {
      throw new CodeuError(`Workspace root is not a directory: ${absolute}`, 'CONFIG_INVALID');
    }
    return new PathBoundary(absolute, await realpath(absolute));
  }

  /**
   * Resolve `input` (relative to the root, or absolute) to an absolute path
   * inside the boundary. Existing paths come back as their real path.
   */
  async resolve(input: string): Promise<string> {
    if (input.includes('\0')) {
      throw new CodeuError(`Path contains a NUL byte: ${JSON.stringify(input)}`, 'INVALID_ARGUMENTS');
    }

    const absolute = resolve(this.root, input);
    if (!isWithinDir(absolute, this.root) && !isWithinDir(absolute, this.realRoot)) {
      throw this.outside(input, absolute);
    }

    const real = await this.realpathOfExistingAncestor(input, absolute);
    if (!isWithinDir(real, this.realRoot)) {
      throw this.outside(input, real);
    }
    return real;
  }

  /** Root-relative POSIX path for display. */
  display(absolute: string): string {
    const base = isWithinDir(absolute, this.realRoot) ? this.realRoot : this.root;
    return toPosix(relative(base, absolute));
  }

  private outside(input: string, resolved: string): CodeuError {
    return new CodeuError(
      `Path "${input}" resolves to ${resolved}, which is outside the workspace root ${this.root}.`,
      'PATH_OUTSIDE_BOUNDARY'
    );
  }

  private async realpathOfExistingAncestor(input: string, absolute: string): Promise<string> {
    const missing: string[] = [];
    let current = absolute;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      try {
        const real = await realpath(current);
        return missing.length === 0 ? real : resolve(real, ...missing.reverse());
      } catch (err) {
        const code = errnoCode(err);
        if (code === 'ELOOP') {
          throw new CodeuError(`Path "${input}" has too many levels of symbolic links.`, 'INVALID_ARGUMENTS', {
            cause: err,
          });
        }
        if (code === 'EACCES') {
          throw new CodeuError(`Path "${input}" cannot be resolved: permission denied.`, 'INVALID_ARGUMENTS', {
            cause: err,
          });
        }
        if (code !== 'ENOENT' && code !== 'ENOTDIR') throw err;
        const parent = dirname(current);
        if (parent === current) return absolute;
        missing.push(current.slice(parent.length).replace(/^[\\/]+/, ''));
        current = parent;
      }
    }
  }
}

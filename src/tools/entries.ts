import { stat } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import picomatch from 'picomatch';
import { z } from 'zod';
import { CodeuError, errnoCode } from '../utils/errors.js';
import type { ToolContext } from './types.js';

export type EntryType = 'directory' | 'file' | 'symlink' | 'other';

export interface ListedEntry {
  name: string;
  /** Root-relative POSIX path, or absolute when requested. */
  path: string;
  type: EntryType;
}

export const TYPE_MARKERS: Record<EntryType, string> = {
  directory: '[D]',
  file: '[F]',
  symlink: '[L]',
  other: '[?]',
};

export function entryType(dirent: Dirent): EntryType {
  if (dirent.isSymbolicLink()) return 'symlink';
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return 'other';
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Directories first, then everything else, each by code-unit order. */
export function sortDirents(entries: readonly Dirent[]): Dirent[] {
  return [...entries].sort((a, b) => {
    const rank = Number(!a.isDirectory()) - Number(!b.isDirectory());
    return rank !== 0 ? rank : compareNames(a.name, b.name);
  });
}

export function toPatternList(patterns: string | readonly string[] | undefined): string[] {
  if (patterns === undefined) return [];
  return typeof patterns === 'string' ? [patterns] : [...patterns];
}

/**
 * Build a predicate over POSIX relative paths. Patterns without a slash match
 * the base name at any depth (`*.ts`), others match the whole path.
 * No patterns matches everything.
 */
export function compileMatcher(patterns: readonly string[]): (relPath: string) => boolean {
  if (patterns.length === 0) return () => true;
  const matchers = patterns.map((p) => picomatch(p, { dot: true, basename: true }));
  return (relPath) => matchers.some((isMatch) => isMatch(relPath));
}

export function requireSomeKind(includeFiles: boolean, includeDirs: boolean): void {
  if (!includeFiles && !includeDirs) {
    throw new CodeuError(
      'At least one of include_files or include_dirs must be true.',
      'INVALID_ARGUMENTS'
    );
  }
}

/** Resolve `input` inside the boundary and stat it. Missing paths are PATH_NOT_FOUND. */
export async function resolveExisting(
  ctx: ToolContext,
  input: string
): Promise<{ absolute: string; info: Stats }> {
  const absolute = await ctx.boundary.resolve(input);
  try {
    return { absolute, info: await stat(absolute) };
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new CodeuError(`Path not found: ${input}`, 'PATH_NOT_FOUND', { cause: err });
    }
    throw err;
  }
}

export async function resolveDirectory(ctx: ToolContext, input: string): Promise<string> {
  const { absolute, info } = await resolveExisting(ctx, input);
  if (!info.isDirectory()) {
    throw new CodeuError(`Not a directory: ${input}`, 'NOT_A_DIRECTORY');
  }
  return absolute;
}

export const PatternsSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .describe('Glob pattern or list of patterns. Patterns without "/" match names at any depth.');

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, relative } from 'node:path';
import { z } from 'zod';
import { CodeuError } from '../utils/errors.js';
import { toPosix } from '../utils/boundary.js';
import {
  PatternsSchema,
  compileMatcher,
  entryType,
  requireSomeKind,
  resolveDirectory,
  sortDirents,
  toPatternList,
} from './entries.js';
import type { ListedEntry } from './entries.js';
import { formatEntry } from './ls.js';
import { defineTool } from './types.js';

export interface TreeEntry extends ListedEntry {
  /** Direct children of the root are depth 1. */
  depth: number;
}

const TreeArgsSchema = z
  .object({
    path: z.string().default('.').describe('Root directory of the listing. Defaults to ".".'),
    max_depth: z
      .number()
      .int()
      .min(1)
      .optional()
      .describe('How many levels to descend, 1 for direct children only. Defaults to the configured maximum (3).'),
    patterns: PatternsSchema,
    include_files: z.boolean().default(true),
    include_dirs: z.boolean().default(true),
    absolute_paths: z.boolean().default(false),
  })
  .strict();

export const treeTool = defineTool({
  name: 'tree',
  description:
    'Recursive depth-first listing of a directory up to max_depth levels. ' +
    'Lines are indented two spaces per level. Symlinks are listed but not followed.',
  readonly: true,
  schema: TreeArgsSchema,

  async execute(args, ctx) {
    requireSomeKind(args.include_files, args.include_dirs);
    const ceiling = ctx.settings.tree.maxDepth;
    const maxDepth = args.max_depth ?? ceiling;
    if (maxDepth > ceiling) {
      throw new CodeuError(`max_depth must be between 1 and ${ceiling}, got ${maxDepth}.`, 'INVALID_ARGUMENTS');
    }

    const root = await resolveDirectory(ctx, args.path);
    const matches = compileMatcher(toPatternList(args.patterns));
    const ignored = new Set(ctx.settings.search.ignore);
    const { maxEntries } = ctx.settings.tree;

    const entries: TreeEntry[] = [];
    const skipped: string[] = [];
    let truncated = false;

    const walk = async (dir: string, depth: number): Promise<void> => {
      let dirents: Dirent[];
      try {
        dirents = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        if (dir === root) throw err;
        ctx.logger.debug(`tree: skipping unreadable ${dir}: ${String(err)}`);
        skipped.push(ctx.boundary.display(dir));
        return;
      }

      for (const dirent of sortDirents(dirents)) {
        if (truncated) return;
        const type = entryType(dirent);
        if (type === 'directory' && ignored.has(dirent.name)) continue;

        const absolute = join(dir, dirent.name);
        const include = type === 'directory' ? args.include_dirs : args.include_files;
        if (include && matches(toPosix(relative(root, absolute)))) {
          if (entries.length >= maxEntries) {
            truncated = true;
            return;
          }
          entries.push({
            name: dirent.name,
            path: args.absolute_paths ? absolute : ctx.boundary.display(absolute),
            type,
            depth,
          });
        }

        if (type === 'directory' && depth < maxDepth) {
          await walk(absolute, depth + 1);
        }
      }
    };

    await walk(root, 1);

    const lines = entries.map((e) => formatEntry(e, '  '.repeat(e.depth - 1)));
    if (truncated) {
      lines.push(`... listing truncated after ${maxEntries} entries`);
    }

    return {
      output: lines.length === 0 ? '(empty)' : lines.join('\n'),
      data: entries,
      metadata: { path: ctx.boundary.display(root), maxDepth, totalEntries: entries.length, truncated, skipped },
    };
  },
});

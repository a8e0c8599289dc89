import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  PatternsSchema,
  TYPE_MARKERS,
  compileMatcher,
  entryType,
  requireSomeKind,
  resolveDirectory,
  sortDirents,
  toPatternList,
} from './entries.js';
import type { ListedEntry } from './entries.js';
import { defineTool } from './types.js';

const LsArgsSchema = z
  .object({
    path: z.string().default('.').describe('Directory to list, relative to the workspace root. Defaults to ".".'),
    patterns: PatternsSchema,
    include_files: z.boolean().default(true).describe('Include files. Defaults to true.'),
    include_dirs: z.boolean().default(true).describe('Include directories. Defaults to true.'),
    absolute_paths: z.boolean().default(false).describe('Show absolute paths instead of workspace-relative ones.'),
  })
  .strict();

export function formatEntry(entry: ListedEntry, indent = ''): string {
  return `${indent}${TYPE_MARKERS[entry.type]} ${entry.name} (${entry.path})`;
}

export const lsTool = defineTool({
  name: 'ls',
  description:
    'List the direct children of a directory, directories first. ' +
    'Each line is "[D] name (path)" for a directory or "[F] name (path)" for a file.',
  readonly: true,
  schema: LsArgsSchema,

  async execute(args, ctx) {
    requireSomeKind(args.include_files, args.include_dirs);
    const dir = await resolveDirectory(ctx, args.path);
    const matches = compileMatcher(toPatternList(args.patterns));

    const entries: ListedEntry[] = [];
    for (const dirent of sortDirents(await readdir(dir, { withFileTypes: true }))) {
      const type = entryType(dirent);
      if (type === 'directory' ? !args.include_dirs : !args.include_files) continue;
      if (!matches(dirent.name)) continue;

      const absolute = join(dir, dirent.name);
      entries.push({
        name: dirent.name,
        path: args.absolute_paths ? absolute : ctx.boundary.display(absolute),
        type,
      });
    }

    ctx.logger.debug(`ls ${args.path}: ${entries.length} entries`);

    return {
      output: entries.length === 0 ? '(empty)' : entries.map((e) => formatEntry(e)).join('\n'),
      data: entries,
      metadata: { path: ctx.boundary.display(dir), totalEntries: entries.length },
    };
  },
});

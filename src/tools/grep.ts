import { readFile, readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, relative } from 'node:path';
import { z } from 'zod';
import { CodeuError } from '../utils/errors.js';
import { toPosix } from '../utils/boundary.js';
import { decodeUtf8, decodeUtf8Lossy, isProbablyBinary, splitLines } from '../utils/text.js';
import { PatternsSchema, compileMatcher, resolveExisting, sortDirents, toPatternList } from './entries.js';
import { defineTool } from './types.js';

export interface GrepMatch {
  path: string;
  /** 1-based. */
  line: number;
  text: string;
  /** Half-open [start, end) character ranges within `text`. */
  spans: Array<[number, number]>;
}

export interface SkippedFile {
  path: string;
  reason: 'binary' | 'not-utf8' | 'too-large' | 'unreadable';
}

const GrepArgsSchema = z
  .object({
    query: z.string().min(1).describe('Text to search for, or a regular expression when use_regex is true.'),
    path: z.string().default('.').describe('Directory to search recursively, or a single file. Defaults to ".".'),
    glob: PatternsSchema.describe('Only search files whose path relative to `path` matches one of these globs.'),
    case_sensitive: z.boolean().default(true),
    use_regex: z.boolean().default(false).describe('Treat query as a JavaScript regular expression.'),
    include_binary: z.boolean().default(false).describe('Also search files that look binary.'),
    max_matches: z.number().int().min(1).optional().describe('Maximum number of occurrences to return.'),
  })
  .strict();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function buildMatcher(query: string, useRegex: boolean, caseSensitive: boolean): RegExp {
  const flags = caseSensitive ? 'g' : 'gi';
  if (!useRegex) return new RegExp(escapeRegExp(query), flags);
  try {
    return new RegExp(query, flags);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CodeuError(`Invalid regular expression: ${reason}`, 'INVALID_ARGUMENTS', { cause: err });
  }
}

/** Regular files under `dir` in traversal order. Ignored directories and symlinks are not entered. */
async function* walkFiles(dir: string, ignored: ReadonlySet<string>, onError: (dir: string) => void): AsyncGenerator<string> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch {
    onError(dir);
    return;
  }
  for (const dirent of sortDirents(dirents)) {
    const absolute = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      if (!ignored.has(dirent.name)) yield* walkFiles(absolute, ignored, onError);
    } else if (dirent.isFile()) {
      yield absolute;
    }
  }
}

type Decoded = { text: string } | { skip: SkippedFile['reason'] };

function decodeForSearch(buffer: Buffer, includeBinary: boolean): Decoded {
  if (isProbablyBinary(buffer)) {
    return includeBinary ? { text: decodeUtf8Lossy(buffer) } : { skip: 'binary' };
  }
  const text = decodeUtf8(buffer);
  return text === null ? { skip: 'not-utf8' } : { text };
}

export const grepTool = defineTool({
  name: 'grep',
  description:
    'Search file contents for a literal string or regular expression. ' +
    'Returns one line per matching line as "path:line: text", or "No matches found.".',
  readonly: true,
  schema: GrepArgsSchema,

  async execute(args, ctx) {
    const { search } = ctx.settings;
    const maxMatches = args.max_matches ?? search.maxMatches;
    const pattern = buildMatcher(args.query, args.use_regex, args.case_sensitive);
    const { absolute: target, info } = await resolveExisting(ctx, args.path);

    const skipped: SkippedFile[] = [];
    const matches: GrepMatch[] = [];
    let total = 0;
    // set once a match beyond the limit is seen
    let limitReached = false;

    const scan = (display: string, text: string): void => {
      const lines = splitLines(text);
      for (let i = 0; i < lines.length && !limitReached; i++) {
        const line = lines[i] ?? '';
        const spans: Array<[number, number]> = [];
        for (const m of line.matchAll(pattern)) {
          if (total >= maxMatches) {
            limitReached = true;
            break;
          }
          const start = m.index ?? 0;
          spans.push([start, start + m[0].length]);
          total++;
        }
        if (spans.length > 0) matches.push({ path: display, line: i + 1, text: line, spans });
      }
    };

    if (info.isDirectory()) {
      const isIncluded = compileMatcher(toPatternList(args.glob));
      const ignored = new Set(search.ignore);
      const onError = (dir: string) => skipped.push({ path: ctx.boundary.display(dir), reason: 'unreadable' });
      for await (const file of walkFiles(target, ignored, onError)) {
        if (limitReached) break;
        if (!isIncluded(toPosix(relative(target, file)))) continue;

        const display = ctx.boundary.display(file);
        let buffer: Buffer;
        try {
          if ((await stat(file)).size > search.maxFileBytes) {
            skipped.push({ path: display, reason: 'too-large' });
            continue;
          }
          buffer = await readFile(file);
        } catch (err) {
          ctx.logger.debug(`grep: cannot read ${display}: ${err instanceof Error ? err.message : String(err)}`);
          skipped.push({ path: display, reason: 'unreadable' });
          continue;
        }

        const decoded = decodeForSearch(buffer, args.include_binary);
        if ('skip' in decoded) {
          skipped.push({ path: display, reason: decoded.skip });
          continue;
        }
        scan(display, decoded.text);
      }
    } else {
      const display = ctx.boundary.display(target);
      if (!info.isFile()) {
        throw new CodeuError(`Not a regular file: ${display}`, 'NOT_A_FILE');
      }
      if (info.size > search.maxFileBytes) {
        throw new CodeuError(
          `File is too large: ${display} is ${info.size} bytes, the limit is ${search.maxFileBytes}.`,
          'INVALID_ARGUMENTS'
        );
      }
      const decoded = decodeForSearch(await readFile(target), args.include_binary);
      if ('skip' in decoded) {
        const what = decoded.skip === 'binary' ? 'appears to be binary' : 'is not valid UTF-8';
        throw new CodeuError(`File ${what}: ${display}`, 'UNSUPPORTED_ENCODING');
      }
      scan(display, decoded.text);
    }

    ctx.logger.debug(`grep "${args.query}" in ${args.path}: ${total} occurrences, ${skipped.length} skipped`);

    const lines = matches.map((m) => `${m.path}:${m.line}: ${m.text}`);
    if (limitReached) lines.push(`... stopped after ${maxMatches} matches`);

    return {
      output: matches.length === 0 ? 'No matches found.' : lines.join('\n'),
      data: matches,
      metadata: { totalMatches: total, limitReached, skipped },
    };
  },
});

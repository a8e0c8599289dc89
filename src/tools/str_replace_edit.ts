import { access, constants } from 'node:fs/promises';
import { z } from 'zod';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { CodeuError, errnoCode } from '../utils/errors.js';
import { lineNumberAt } from '../utils/text.js';
import { readTextFile } from './text-file.js';
import { defineTool } from './types.js';

const SNIPPET_RADIUS = 120;
const PERMISSION_ERRORS = new Set(['EACCES', 'EPERM', 'EROFS']);

const StrReplaceArgsSchema = z
  .object({
    path: z.string().min(1).describe('File to edit, relative to the workspace root.'),
    old_str: z.string().describe('Exact text to replace. Empty only when the file is empty.'),
    new_str: z.string().describe('Replacement text. May be empty to delete old_str.'),
    occurrence_index: z
      .number()
      .int()
      .min(0)
      .optional()
      .describe('0-based index of the occurrence to replace when old_str appears more than once.'),
    replace_all: z.boolean().optional().describe('Replace every occurrence of old_str.'),
  })
  .strict();

/** Start offsets of non-overlapping occurrences of `needle`, left to right. */
export function findOccurrences(haystack: string, needle: string): number[] {
  const found: number[] = [];
  let from = 0;
  for (;;) {
    const at = haystack.indexOf(needle, from);
    if (at === -1) return found;
    found.push(at);
    from = at + needle.length;
  }
}

function formatDelta(delta: number): string {
  return `${delta >= 0 ? '+' : ''}${delta}`;
}

async function assertWritable(absolute: string, display: string): Promise<void> {
  try {
    await access(absolute, constants.W_OK);
  } catch (err) {
    throw new CodeuError(`File is not writable: ${display}`, 'WRITE_PERMISSION_DENIED', { cause: err });
  }
}

export const strReplaceEditTool = defineTool({
  name: 'str_replace_edit',
  aliases: ['str_replace_editor', 'str_replace_based_edit_tool'],
  description:
    'Replace an exact substring in a text file and save it atomically. ' +
    'old_str must match the file content exactly, including whitespace. ' +
    'When old_str occurs more than once, pass occurrence_index or replace_all.',
  readonly: false,
  schema: StrReplaceArgsSchema,

  async execute(args, ctx) {
    if (args.occurrence_index !== undefined && args.replace_all === true) {
      throw new CodeuError('Pass either occurrence_index or replace_all, not both.', 'INVALID_ARGUMENTS');
    }

    const file = await readTextFile(ctx, args.path, ctx.settings.editor.maxFileBytes);
    const original = file.text;

    let starts: number[];
    let action: string;

    if (args.old_str === '') {
      if (original !== '') {
        throw new CodeuError(
          'old_str may only be empty when the file is empty; pass the text to replace.',
          'INVALID_ARGUMENTS'
        );
      }
      starts = [0];
      action = 'Inserted into empty file';
    } else {
      const occurrences = findOccurrences(original, args.old_str);
      if (occurrences.length === 0) {
        throw new CodeuError(`old_str not found in ${file.display}; no changes applied.`, 'NO_MATCH');
      }

      const policy = ctx.settings.editor.onMultipleMatches;
      if (args.occurrence_index !== undefined) {
        const at = occurrences[args.occurrence_index];
        if (at === undefined) {
          throw new CodeuError(
            `occurrence_index ${args.occurrence_index} is out of range; found ${occurrences.length} occurrence(s).`,
            'NO_MATCH'
          );
        }
        starts = [at];
      } else if (args.replace_all === true || occurrences.length === 1 || policy === 'all') {
        starts = occurrences;
      } else if (policy === 'first') {
        starts = occurrences.slice(0, 1);
      } else {
        const lines = occurrences.map((at) => lineNumberAt(original, at));
        throw new CodeuError(
          `old_str occurs ${occurrences.length} times in ${file.display} (lines ${lines.join(', ')}); ` +
            'pass occurrence_index or replace_all, or include more context in old_str.',
          'AMBIGUOUS_MATCH'
        );
      }

      const ranges = starts.map((at) => `${at}-${at + args.old_str.length}`).join(', ');
      action =
        starts.length === 1
          ? `Replaced occurrence #${args.occurrence_index ?? 0} (chars ${ranges})`
          : `Replaced ${starts.length} occurrences (chars ${ranges})`;
    }

    let edited = '';
    let cursor = 0;
    for (const at of starts) {
      edited += original.slice(cursor, at) + args.new_str;
      cursor = at + args.old_str.length;
    }
    edited += original.slice(cursor);

    await assertWritable(file.absolute, file.display);
    try {
      await writeFileAtomic(file.absolute, edited, file.info.mode & 0o777);
    } catch (err) {
      const code = errnoCode(err);
      if (code !== undefined && PERMISSION_ERRORS.has(code)) {
        throw new CodeuError(`Permission denied writing ${file.display}`, 'WRITE_PERMISSION_DENIED', { cause: err });
      }
      throw err;
    }

    const first = starts[0] ?? 0;
    const snippet = edited.slice(
      Math.max(0, first - SNIPPET_RADIUS),
      Math.min(edited.length, first + args.new_str.length + SNIPPET_RADIUS)
    );
    const delta = edited.length - original.length;

    ctx.logger.info(`edited ${file.display}: ${starts.length} replacement(s), ${formatDelta(delta)} chars`);

    return {
      output: [
        `Path: ${file.display}`,
        action,
        `Delta size: ${formatDelta(delta)} chars`,
        `New file size: ${edited.length} chars`,
        '',
        'Snippet around edit:',
        snippet,
      ].join('\n'),
      metadata: { path: file.display, replacements: starts.length, offsets: starts, delta, size: edited.length },
    };
  },
});

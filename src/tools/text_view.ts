import { z } from 'zod';
import { CodeuError } from '../utils/errors.js';
import { splitLinesKeepEnds } from '../utils/text.js';
import { readTextFile } from './text-file.js';
import { defineTool } from './types.js';

const TextViewArgsSchema = z
  .object({
    path: z.string().min(1).describe('File to view, relative to the workspace root.'),
    start_line: z.number().int().positive().optional().describe('First line to show (1-based).'),
    end_line: z.number().int().positive().optional().describe('Last line to show (1-based, inclusive).'),
    max_characters: z.number().int().min(0).optional().describe('Cut the content after this many characters.'),
  })
  .strict();

export const textViewTool = defineTool({
  name: 'text_view',
  description:
    'View a text file, optionally a line range. ' +
    'Output starts with "Path:" and "Lines: start-end (total N)" followed by a blank line and the content.',
  readonly: true,
  schema: TextViewArgsSchema,

  async execute(args, ctx) {
    if (args.start_line !== undefined && args.end_line !== undefined && args.end_line < args.start_line) {
      throw new CodeuError(
        `end_line (${args.end_line}) must not be less than start_line (${args.start_line}).`,
        'INVALID_ARGUMENTS'
      );
    }

    const file = await readTextFile(ctx, args.path, ctx.settings.editor.maxFileBytes);
    const lines = splitLinesKeepEnds(file.text);
    const total = lines.length;

    if (args.start_line !== undefined && args.start_line > Math.max(total, 1)) {
      throw new CodeuError(
        `start_line ${args.start_line} is past the end of ${file.display} (${total} lines).`,
        'INVALID_ARGUMENTS'
      );
    }

    const start = total === 0 ? 0 : (args.start_line ?? 1);
    const end = Math.min(total, args.end_line ?? total);
    let content = total === 0 ? '' : lines.slice(start - 1, end).join('');

    const truncated = args.max_characters !== undefined && content.length > args.max_characters;
    if (args.max_characters !== undefined && truncated) {
      content = content.slice(0, args.max_characters);
    }

    const header = [`Path: ${file.display}`, `Lines: ${start}-${end} (total ${total})`];
    if (truncated) {
      header.push(`Note: content truncated to ${args.max_characters} characters.`);
    }

    return {
      output: [...header, '', content].join('\n'),
      metadata: { path: file.display, startLine: start, endLine: end, totalLines: total, truncated },
    };
  },
});

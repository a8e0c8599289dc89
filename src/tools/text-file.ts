import { readFile, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { CodeuError, errnoCode } from '../utils/errors.js';
import { decodeUtf8, isProbablyBinary } from '../utils/text.js';
import type { ToolContext } from './types.js';

export interface TextFile {
  absolute: string;
  display: string;
  text: string;
  info: Stats;
}

/**
 * Resolve `input` inside the boundary and read it as strict UTF-8 text.
 */
export async function readTextFile(ctx: ToolContext, input: string, maxBytes: number): Promise<TextFile> {
  const absolute = await ctx.boundary.resolve(input);
  const display = ctx.boundary.display(absolute);

  let info: Stats;
  try {
    info = await stat(absolute);
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new CodeuError(`File not found: ${input}`, 'FILE_NOT_FOUND', { cause: err });
    }
    throw err;
  }
  if (!info.isFile()) {
    throw new CodeuError(`Not a regular file: ${display}`, 'NOT_A_FILE');
  }
  if (info.size > maxBytes) {
    throw new CodeuError(
      `File is too large: ${display} is ${info.size} bytes, the limit is ${maxBytes}.`,
      'INVALID_ARGUMENTS'
    );
  }

  const buffer = await readFile(absolute);
  if (isProbablyBinary(buffer)) {
    throw new CodeuError(`File appears to be binary: ${display}`, 'UNSUPPORTED_ENCODING');
  }
  const text = decodeUtf8(buffer);
  if (text === null) {
    throw new CodeuError(`File is not valid UTF-8: ${display}`, 'UNSUPPORTED_ENCODING');
  }
  return { absolute, display, text, info };
}

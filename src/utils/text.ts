const BINARY_SNIFF_BYTES = 8192;

/** A file is treated as binary when its first 8 KiB hold a NUL byte. */
export function isProbablyBinary(buffer: Uint8Array): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lossyDecoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

/**
 * Decode UTF-8 without substitution. Returns null for invalid sequences.
 * A leading BOM is kept so re-encoding gives back the same bytes.
 */
export function decodeUtf8(buffer: Uint8Array): string | null {
  try {
    return strictDecoder.decode(buffer);
  } catch (err) {
    if (err instanceof TypeError) return null;
    throw err;
  }
}

export function decodeUtf8Lossy(buffer: Uint8Array): string {
  return lossyDecoder.decode(buffer);
}

/**
 * Split text into lines, dropping the terminator (`\n` or `\r\n`).
 * A trailing newline does not produce an empty final line.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Split text into lines keeping each line's terminator, so that joining the
 * result gives back the input.
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/** 1-based line number of a character offset. */
export function lineNumberAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Collects chunks up to `limit` bytes and remembers whether anything was dropped.
 */
export class ByteCollector {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      if (chunk.length > 0) this.truncated = true;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  /** Collected bytes as text; a multi-byte sequence cut at the limit becomes U+FFFD. */
  text(): string {
    return decodeUtf8Lossy(Buffer.concat(this.chunks));
  }
}

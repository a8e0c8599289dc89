import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, stat, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { rmSync } from 'node:fs';
import { writeFileAtomic } from './atomic-write.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'codeu-atomic-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('writeFileAtomic', () => {
  it('replaces the file and applies the mode', async () => {
    const target = join(tmpDir, 'a.txt');
    await writeFile(target, 'old');
    await writeFileAtomic(target, 'new', 0o600);

    expect(await readFile(target, 'utf8')).toBe('new');
    expect((await stat(target)).mode & 0o777).toBe(0o600);
    expect(await readdir(tmpDir)).toEqual(['a.txt']);
  });

  it('cleans up the temp file when the rename fails', async () => {
    const target = join(tmpDir, 'dir');
    await mkdir(join(target, 'child'), { recursive: true });

    await expect(writeFileAtomic(target, 'x')).rejects.toThrow();
    expect(await readdir(tmpDir)).toEqual(['dir']);
  });
});

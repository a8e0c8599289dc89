import { chmod, open, rename, rm } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { basename, dirname, join } from 'node:path';

/**
 * Replace `target` with `content` so readers see either the old or the new
 * file, never a partial one. The temp file lives beside the target (same
 * filesystem) and is removed if anything fails before the rename.
 */
export async function writeFileAtomic(target: string, content: string, mode = 0o644): Promise<void> {
  const tmp = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`);
  try {
    const handle = await open(tmp, 'wx', mode);
    try {
      await handle.writeFile(content, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    // open() is subject to the umask
    await chmod(tmp, mode);
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

import { existsSync } from 'fs';
import { mkdir, readFile, readdir, stat, unlink, writeFile } from 'fs/promises';
import path from 'path';

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'];

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Image artifacts on disk, one file per command id. None of these methods
 * touch the simulator store; callers resolve paths under the lock and do
 * the I/O after leaving it.
 */
export class ImageStore {
  constructor(readonly directory: string) {}

  pathFor(commandId: string): string {
    return path.join(this.directory, `${commandId}.png`);
  }

  async write(commandId: string, bytes: Buffer): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(commandId);
    await writeFile(target, bytes);
    return target;
  }

  exists(imagePath: string): boolean {
    return existsSync(imagePath);
  }

  /** Returns null when the file has gone missing. */
  async read(imagePath: string): Promise<Buffer | null> {
    try {
      return await readFile(imagePath);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async size(imagePath: string): Promise<number | null> {
    try {
      return (await stat(imagePath)).size;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  /** Returns false when there was nothing to delete. */
  async remove(imagePath: string): Promise<boolean> {
    try {
      await unlink(imagePath);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /** Deletes every image file in the directory; returns how many went. */
  async clear(): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw err;
    }

    let deleted = 0;
    for (const entry of entries) {
      if (!IMAGE_EXTENSIONS.includes(path.extname(entry).toLowerCase())) continue;
      if (await this.remove(path.join(this.directory, entry))) deleted++;
    }
    return deleted;
  }
}

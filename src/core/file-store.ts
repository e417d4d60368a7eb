import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { FileSystemError, getErrorCode, getErrorMessage } from '../errors.js';

/**
 * Where issue and board files are read from and written to.
 */
export interface FileStore {
  /** Current content of `path`, or null when the file does not exist. */
  read(path: string): Promise<string | null>;
  /** Replace `path` with `content`, creating parent directories. */
  write(path: string, content: string): Promise<void>;
}

/**
 * node:fs store. Writes go to a sibling temp file that is renamed over the
 * target, so a crash leaves either the old or the new file, never a mix.
 */
export class FsFileStore implements FileStore {
  async read(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch (err) {
      if (getErrorCode(err) === 'ENOENT') return null;
      throw new FileSystemError(`Failed to read ${path}: ${getErrorMessage(err)}`, path, 'read', err);
    }
  }

  async write(path: string, content: string): Promise<void> {
    const tmpPath = `${path}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmpPath, content, 'utf-8');
      await rename(tmpPath, path);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw new FileSystemError(`Failed to write ${path}: ${getErrorMessage(err)}`, path, 'write', err);
    }
  }
}

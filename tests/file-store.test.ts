import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileSystemError } from '../src/errors.js';
import { FsFileStore } from '../src/core/file-store.js';

let tempDir: string;
const store = new FsFileStore();

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'jvsync-store-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('FsFileStore', () => {
  it('should return null for a missing file', async () => {
    expect(await store.read(join(tempDir, 'missing.md'))).toBeNull();
  });

  it('should create parent directories and leave no temp file', async () => {
    const path = join(tempDir, 'Jira Tickets', 'PROJ-1.md');

    await store.write(path, 'first\n');
    await store.write(path, 'second\n');

    expect(await readFile(path, 'utf-8')).toBe('second\n');
    expect(await readdir(join(tempDir, 'Jira Tickets'))).toEqual(['PROJ-1.md']);
  });

  it('should wrap read failures', async () => {
    // Reading a directory fails with EISDIR
    await expect(store.read(tempDir)).rejects.toBeInstanceOf(FileSystemError);
  });

  it('should wrap write failures and clean up', async () => {
    const error = await store.write(tempDir, 'x').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FileSystemError);
    expect(error).toMatchObject({ path: tempDir, operation: 'write' });
    expect(existsSync(`${tempDir}.tmp`)).toBe(false);
  });
});

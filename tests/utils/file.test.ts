import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  calculateFileHash,
  ensureDir,
  getFileSizeBytes,
  moveFile,
  pathExists,
  removeFile,
  safeWriteFile,
  formatCommandLine,
} from '@fileclassify/utils';

describe('file utilities', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fileclassify-utils-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create parent folders when writing', async () => {
    const target = join(dir, 'a', 'b', 'note.txt');
    await safeWriteFile(target, 'hello');

    expect(await readFile(target, 'utf8')).toBe('hello');
  });

  it('should hash file contents with sha256', async () => {
    const target = join(dir, 'hello.txt');
    await writeFile(target, 'hello');

    expect(await calculateFileHash(target)).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
    expect(await getFileSizeBytes(target)).toBe(5);
  });

  it('should not fail when removing a missing file', async () => {
    await expect(removeFile(join(dir, 'nothing.bin'))).resolves.toBeUndefined();
  });

  it('should move a file into a new folder', async () => {
    const source = join(dir, 'in.txt');
    const destination = join(dir, 'sorted', 'Work', 'in.txt');
    await writeFile(source, 'data');
    await ensureDir(dir);

    await moveFile(source, destination);

    expect(await pathExists(source)).toBe(false);
    expect(await readFile(destination, 'utf8')).toBe('data');
  });

  it('should refuse to replace an existing destination', async () => {
    const source = join(dir, 'in.txt');
    const destination = join(dir, 'taken.txt');
    await writeFile(source, 'new');
    await writeFile(destination, 'old');

    await expect(moveFile(source, destination)).rejects.toThrow(`Destination already exists: ${destination}`);
    expect(await readFile(source, 'utf8')).toBe('new');
    expect(await readFile(destination, 'utf8')).toBe('old');
  });
});

describe('formatCommandLine', () => {
  it('should quote arguments containing spaces', () => {
    expect(formatCommandLine('pkg', ['my app.js', '--output', 'out'])).toBe('pkg "my app.js" --output out');
  });
});

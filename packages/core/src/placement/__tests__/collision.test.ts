import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, removeDir, writeFile } from '../../__tests__/fixtures';
import { SMALL_FILE_THRESHOLD, isSameFile, resolveCollisionFreeName } from '../collision';
import { readFileRecord } from '../file-record';

describe('resolveCollisionFreeName', () => {
  let root: string;
  let target: string;

  beforeEach(() => {
    root = makeTempDir();
    target = path.join(root, 'target');
    fs.mkdirSync(target);
  });

  afterEach(() => {
    removeDir(root);
  });

  it('returns the original name when it is free', async () => {
    const record = await readFileRecord(writeFile(root, 'in/a.jpg', 'alpha'));

    await expect(resolveCollisionFreeName(record, target)).resolves.toBe(path.join(target, 'a.jpg'));
  });

  it('counts up past names that are taken', async () => {
    writeFile(target, 'a.jpg', 'first');
    writeFile(target, 'a_1.jpg', 'second');
    const record = await readFileRecord(writeFile(root, 'in/a.jpg', 'alpha'));

    await expect(resolveCollisionFreeName(record, target)).resolves.toBe(path.join(target, 'a_2.jpg'));
  });

  it('keeps the extension as written when renaming', async () => {
    writeFile(target, 'Scan.PDF', 'first');
    const record = await readFileRecord(writeFile(root, 'in/Scan.PDF', 'second'));

    await expect(resolveCollisionFreeName(record, target)).resolves.toBe(path.join(target, 'Scan_1.PDF'));
  });

  it('renames files without an extension', async () => {
    writeFile(target, 'README', 'first');
    const record = await readFileRecord(writeFile(root, 'in/README', 'second'));

    await expect(resolveCollisionFreeName(record, target)).resolves.toBe(path.join(target, 'README_1'));
  });

  it('falls back to a timestamp once the counter runs out', async () => {
    writeFile(target, 'a.jpg', 'first');
    writeFile(target, 'a_1.jpg', 'second');
    writeFile(target, 'a_2.jpg', 'third');
    const record = await readFileRecord(writeFile(root, 'in/a.jpg', 'alpha'));

    const name = await resolveCollisionFreeName(record, target, {
      maxAttempts: 2,
      now: () => new Date(2024, 0, 2, 3, 4, 5),
    });

    expect(name).toBe(path.join(target, 'a_20240102_030405.jpg'));
  });

  it('rejects an identical file with AlreadyExists pointing at the existing copy', async () => {
    writeFile(target, 'a.jpg', 'same bytes');
    const record = await readFileRecord(writeFile(root, 'in/a.jpg', 'same bytes'));

    await expect(resolveCollisionFreeName(record, target)).rejects.toMatchObject({
      code: 'AlreadyExists',
      path: path.join(target, 'a.jpg'),
    });
  });
});

describe('isSameFile', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('compares small files by content', async () => {
    const a = writeFile(root, 'a.txt', 'hello');
    const b = writeFile(root, 'b.txt', 'hello');
    const c = writeFile(root, 'c.txt', 'world');

    expect(await isSameFile(a, b)).toBe(true);
    expect(await isSameFile(a, c)).toBe(false);
  });

  it('treats different sizes as different files', async () => {
    const a = writeFile(root, 'a.txt', 'short');
    const b = writeFile(root, 'b.txt', 'much longer');

    expect(await isSameFile(a, b)).toBe(false);
  });

  it('compares large files by modification time', async () => {
    const size = SMALL_FILE_THRESHOLD + 10;
    const a = writeFile(root, 'a.bin', Buffer.alloc(size, 1));
    const b = writeFile(root, 'b.bin', Buffer.alloc(size, 2));
    const when = new Date(2024, 5, 1, 12, 0, 0);
    fs.utimesSync(a, when, when);
    fs.utimesSync(b, when, new Date(when.getTime() + 200));

    expect(await isSameFile(a, b)).toBe(true);

    fs.utimesSync(b, when, new Date(when.getTime() + 5000));
    expect(await isSameFile(a, b)).toBe(false);
  });

  it('treats a missing file as different', async () => {
    const a = writeFile(root, 'a.txt', 'hello');

    expect(await isSameFile(a, path.join(root, 'missing.txt'))).toBe(false);
  });
});

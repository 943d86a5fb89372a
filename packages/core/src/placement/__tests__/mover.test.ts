import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeTempDir, readText, removeDir, writeFile } from '../../__tests__/fixtures';
import { moveFile } from '../mover';

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe('moveFile', () => {
  let root: string;
  let source: string;
  let target: string;
  const modified = new Date(2000, 0, 1, 12, 0, 0);

  beforeEach(() => {
    root = makeTempDir();
    source = writeFile(root, 'in/report.pdf', 'pages');
    fs.utimesSync(source, modified, modified);
    target = path.join(root, 'out', 'report.pdf');
    fs.mkdirSync(path.dirname(target));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(root);
  });

  it('renames within one filesystem', async () => {
    await moveFile(source, target);

    expect(readText(target)).toBe('pages');
    expect(fs.existsSync(source)).toBe(false);
  });

  it('copies then unlinks across filesystems and keeps the modification time', async () => {
    vi.spyOn(fs.promises, 'rename').mockRejectedValueOnce(errnoError('EXDEV', 'cross-device link not permitted'));

    await moveFile(source, target);

    expect(readText(target)).toBe('pages');
    expect(fs.statSync(target).mtimeMs).toBe(modified.getTime());
    expect(fs.existsSync(source)).toBe(false);
  });

  it('removes the copy and keeps the source when the cross-device move fails', async () => {
    vi.spyOn(fs.promises, 'rename').mockRejectedValueOnce(errnoError('EXDEV', 'cross-device link not permitted'));
    vi.spyOn(fs.promises, 'utimes').mockRejectedValueOnce(errnoError('EIO', 'i/o error'));

    await expect(moveFile(source, target)).rejects.toMatchObject({ code: 'IOFailure', message: 'i/o error' });

    expect(readText(source)).toBe('pages');
    expect(fs.existsSync(target)).toBe(false);
  });

  it('refuses to copy over a file that appeared at the target', async () => {
    writeFile(root, 'out/report.pdf', 'someone else');
    vi.spyOn(fs.promises, 'rename').mockRejectedValueOnce(errnoError('EXDEV', 'cross-device link not permitted'));

    await expect(moveFile(source, target)).rejects.toMatchObject({
      code: 'IOFailure',
      message: `Target appeared during move: ${target}`,
    });

    expect(readText(target)).toBe('someone else');
    expect(readText(source)).toBe('pages');
  });

  it('reports a missing source as NotFound', async () => {
    await expect(moveFile(path.join(root, 'in', 'gone.pdf'), target)).rejects.toMatchObject({ code: 'NotFound' });
  });
});

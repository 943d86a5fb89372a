import * as fs from 'fs';
import * as path from 'path';
import { PlacementError, errnoCode, toPlacementError } from '../errors';

export interface DirectoryEntry {
  name: string;
  isFile: boolean;
}

/**
 * Lists the immediate children of a directory. Never recurses.
 */
export interface DirectoryEnumerator {
  listImmediateChildren(directory: string): Promise<DirectoryEntry[]>;
}

export type DirentLike = Pick<fs.Dirent, 'name' | 'isFile' | 'isDirectory'>;

/**
 * Classifies one readdir entry. Anything that is neither a plain file nor
 * a directory (symlinks, and entries of unknown type on filesystems that
 * do not report one) is decided by stat.
 */
export async function toDirectoryEntry(directory: string, dirent: DirentLike): Promise<DirectoryEntry> {
  if (dirent.isFile()) {
    return { name: dirent.name, isFile: true };
  }
  if (dirent.isDirectory()) {
    return { name: dirent.name, isFile: false };
  }
  return { name: dirent.name, isFile: await isFileTarget(path.join(directory, dirent.name)) };
}

/**
 * Filesystem enumerator. An entry that cannot be stat'ed is reported as a
 * file so the engine records the failure.
 */
export class FsDirectoryEnumerator implements DirectoryEnumerator {
  async listImmediateChildren(directory: string): Promise<DirectoryEntry[]> {
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === 'ENOTDIR') {
        throw new PlacementError('IOFailure', `Not a directory: ${directory}`, { path: directory, cause: error });
      }
      const failure = toPlacementError(error);
      throw new PlacementError(failure.code, `Cannot list ${directory}: ${failure.message}`, {
        path: directory,
        cause: error,
      });
    }

    const entries: DirectoryEntry[] = [];
    for (const dirent of dirents) {
      entries.push(await toDirectoryEntry(directory, dirent));
    }
    return entries;
  }
}

async function isFileTarget(linkPath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(linkPath)).isFile();
  } catch {
    return true;
  }
}

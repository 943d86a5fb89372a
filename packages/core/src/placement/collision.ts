import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { PlacementError, errnoCode, toPlacementError } from '../errors';
import { formatDate } from './date-format';
import type { FileRecord } from './file-record';

/** Files below this size are compared by content hash. */
export const SMALL_FILE_THRESHOLD = 1024 * 1024;
/** Larger files of equal size count as identical within this mtime distance. */
export const MTIME_TOLERANCE_MS = 1000;
export const MAX_RENAME_ATTEMPTS = 1000;

export interface CollisionOptions {
  maxAttempts?: number;
  /** Clock for the timestamp fallback name. */
  now?: () => Date;
}

/**
 * MD5 of a file's content. Identity only, not security.
 */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('md5');
    const stream = fs.createReadStream(filePath);
    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Same-file heuristic: sizes first, then content hash for small files or
 * mtime proximity for large ones. Anything unreadable counts as different.
 */
export async function isSameFile(first: string, second: string): Promise<boolean> {
  try {
    const [a, b] = await Promise.all([fs.promises.stat(first), fs.promises.stat(second)]);
    if (a.size !== b.size) {
      return false;
    }
    if (a.size < SMALL_FILE_THRESHOLD) {
      const [hashA, hashB] = await Promise.all([hashFile(first), hashFile(second)]);
      return hashA === hashB;
    }
    return Math.abs(a.mtimeMs - b.mtimeMs) < MTIME_TOLERANCE_MS;
  } catch {
    return false;
  }
}

export async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.promises.lstat(candidate);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw toPlacementError(error);
  }
}

/**
 * Picks a destination in `directoryPath` that does not overwrite anything.
 *
 * - free name: returned as is
 * - taken by an identical file: throws AlreadyExists (path = the existing file)
 * - taken by a different file: name_1.ext, name_2.ext, ... and after
 *   maxAttempts a name_YYYYMMDD_HHMMSS.ext that is not re-checked
 */
export async function resolveCollisionFreeName(
  record: FileRecord,
  directoryPath: string,
  options: CollisionOptions = {}
): Promise<string> {
  const maxAttempts = options.maxAttempts ?? MAX_RENAME_ATTEMPTS;
  const now = options.now ?? (() => new Date());

  const direct = path.join(directoryPath, record.name);
  if (!(await pathExists(direct))) {
    return direct;
  }

  if (await isSameFile(record.path, direct)) {
    throw new PlacementError('AlreadyExists', `Identical file already exists: ${direct}`, { path: direct });
  }

  const suffix = path.extname(record.name);
  for (let counter = 1; counter <= maxAttempts; counter++) {
    const candidate = path.join(directoryPath, `${record.baseName}_${counter}${suffix}`);
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }

  return path.join(directoryPath, `${record.baseName}_${formatDate(now(), '%Y%m%d_%H%M%S')}${suffix}`);
}

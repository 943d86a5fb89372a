import * as fs from 'fs';
import * as path from 'path';
import { PlacementError, toPlacementError } from '../errors';

/**
 * Snapshot of one file, taken right before it is classified.
 */
export interface FileRecord {
  path: string;
  name: string;
  baseName: string;
  /** Lower-cased, with the leading dot; '' when the name has none. */
  extension: string;
  sizeBytes: number;
  createdTime: Date;
  modifiedTime: Date;
  accessedTime: Date;
}

/**
 * Builds a FileRecord from stat data.
 * Filesystems without birth times report 0; ctime stands in for those.
 */
export function fileRecordFromStats(filePath: string, stats: fs.Stats): FileRecord {
  const absolute = path.resolve(filePath);
  const name = path.basename(absolute);
  const extension = path.extname(name);

  return {
    path: absolute,
    name,
    baseName: extension ? name.slice(0, -extension.length) : name,
    extension: extension.toLowerCase(),
    sizeBytes: stats.size,
    createdTime: stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime,
    modifiedTime: stats.mtime,
    accessedTime: stats.atime,
  };
}

export async function readFileRecord(filePath: string): Promise<FileRecord> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(filePath);
  } catch (error) {
    throw toPlacementError(error);
  }
  if (!stats.isFile()) {
    throw new PlacementError('IOFailure', `Not a regular file: ${filePath}`, { path: filePath });
  }
  return fileRecordFromStats(filePath, stats);
}

import * as fs from 'fs';
import * as path from 'path';
import type { RuleSet } from '../rules/rule-set';
import { PlacementError, errnoCode, toPlacementError } from '../errors';
import { formatDate } from './date-format';
import type { FileRecord } from './file-record';

export function classify(record: FileRecord, ruleSet: RuleSet): string {
  return ruleSet.categoryFor(record.extension);
}

/**
 * Where a file of this category goes, without touching the disk.
 */
export function targetDirectoryFor(record: FileRecord, category: string, ruleSet: RuleSet, targetRoot: string): string {
  const categoryDir = path.join(path.resolve(targetRoot), category);
  if (!ruleSet.organizeByDate) {
    return categoryDir;
  }
  return path.join(categoryDir, formatDate(record.createdTime, ruleSet.dateFormat));
}

/**
 * Computes the target directory and makes sure it exists.
 * An existing directory (ours or a concurrent caller's) is fine.
 */
export async function resolveTargetDirectory(
  record: FileRecord,
  category: string,
  ruleSet: RuleSet,
  targetRoot: string
): Promise<string> {
  const directory = targetDirectoryFor(record, category, ruleSet, targetRoot);
  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'EEXIST' || code === 'ENOTDIR') {
      throw new PlacementError('IOFailure', `Cannot create ${directory}: a file is in the way`, { cause: error });
    }
    throw toPlacementError(error);
  }
  return directory;
}

import * as fs from 'fs';
import { PlacementError, errnoCode, errorMessage, toPlacementError } from '../errors';

/**
 * Moves a file. Same volume: one rename. Across volumes (EXDEV): copy,
 * then unlink the source.
 *
 * Either the file ends up at `target` and is gone from `source`, or the
 * source is left as it was and nothing is left at `target`.
 */
export async function moveFile(source: string, target: string): Promise<void> {
  try {
    await fs.promises.rename(source, target);
    return;
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') {
      throw toPlacementError(error);
    }
  }

  await copyThenUnlink(source, target);
}

async function copyThenUnlink(source: string, target: string): Promise<void> {
  try {
    await fs.promises.copyFile(source, target, fs.constants.COPYFILE_EXCL);
    const stats = await fs.promises.stat(source);
    await fs.promises.utimes(target, stats.atime, stats.mtime);
    await fs.promises.unlink(source);
  } catch (error) {
    await discardPartialCopy(source, target, error);
    if (errnoCode(error) === 'EEXIST') {
      throw new PlacementError('IOFailure', `Target appeared during move: ${target}`, { cause: error });
    }
    throw toPlacementError(error);
  }
}

async function discardPartialCopy(source: string, target: string, cause: unknown): Promise<void> {
  // COPYFILE_EXCL refused to write: whatever sits at target is not ours
  if (errnoCode(cause) === 'EEXIST') {
    return;
  }
  // Source already unlinked: the copy is the only one left
  try {
    await fs.promises.access(source);
  } catch {
    return;
  }
  try {
    await fs.promises.rm(target, { force: true });
  } catch (cleanupError) {
    throw toPlacementError(
      new Error(`Move failed (${errorMessage(cause)}) and ${target} could not be removed: ${errorMessage(cleanupError)}`)
    );
  }
}

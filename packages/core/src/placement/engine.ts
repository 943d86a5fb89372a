import * as fs from 'fs';
import * as path from 'path';
import type { BatchSummary, DirectoryStats, PlacementResult, PreviewEntry } from '../contracts';
import { errorMessage, toPlacementError } from '../errors';
import { FsDirectoryEnumerator, type DirectoryEntry, type DirectoryEnumerator } from '../indexer/enumerator';
import { silentLogger, type Logger } from '../logging/logger';
import { OutcomeRecorder } from '../logging/outcome-recorder';
import { isHiddenName, type RuleSet } from '../rules/rule-set';
import { classify, resolveTargetDirectory, targetDirectoryFor } from './classify';
import { resolveCollisionFreeName, type CollisionOptions } from './collision';
import { DirectoryLock } from './directory-lock';
import { readFileRecord } from './file-record';
import { moveFile } from './mover';

export const OPERATION_ORGANIZE = 'organize';

export interface PlacementEngineOptions {
  logger?: Logger;
  recorder?: OutcomeRecorder;
  enumerator?: DirectoryEnumerator;
  /** Share one lock between engines that write into the same tree. */
  lock?: DirectoryLock;
  collision?: CollisionOptions;
}

export interface PlaceAllOptions {
  /** Checked before each file; an in-flight move always completes. */
  signal?: AbortSignal;
  operation?: string;
}

/**
 * PlacementEngine - decides where each file goes and moves it there.
 *
 * Files are handled one at a time. Moves into the same target directory
 * are serialized through the DirectoryLock, so a batch and a watch session
 * sharing this engine never pick the same free name.
 */
export class PlacementEngine {
  private readonly logger: Logger;
  private readonly recorder: OutcomeRecorder;
  private readonly enumerator: DirectoryEnumerator;
  private readonly lock: DirectoryLock;
  private readonly collision: CollisionOptions;

  constructor(options: PlacementEngineOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.recorder = options.recorder ?? new OutcomeRecorder(this.logger);
    this.enumerator = options.enumerator ?? new FsDirectoryEnumerator();
    this.lock = options.lock ?? new DirectoryLock();
    this.collision = options.collision ?? {};
  }

  /**
   * Places one file under `targetRoot`. Never throws: every problem ends
   * up in the returned result and in exactly one recorded outcome.
   *
   * A duplicate of a file already at the destination is `skipped` and the
   * source stays where it is.
   */
  async placeFile(
    filePath: string,
    targetRoot: string,
    ruleSet: RuleSet,
    operation: string = OPERATION_ORGANIZE
  ): Promise<PlacementResult> {
    const source = path.resolve(filePath);
    let category = '';
    let targetDirectory = '';
    let result: PlacementResult;

    try {
      const record = await readFileRecord(source);
      category = classify(record, ruleSet);
      targetDirectory = await resolveTargetDirectory(record, category, ruleSet, targetRoot);

      const directory = targetDirectory;
      const targetPath = await this.lock.run(directory, async () => {
        const finalPath = await resolveCollisionFreeName(record, directory, this.collision);
        await moveFile(source, finalPath);
        return finalPath;
      });

      result = { source, category, targetDirectory, targetPath, outcome: 'moved' };
    } catch (error) {
      const failure = toPlacementError(error);
      result = {
        source,
        category,
        targetDirectory,
        targetPath: failure.path ?? '',
        outcome: failure.code === 'AlreadyExists' ? 'skipped' : 'failed',
        error: { code: failure.code, message: failure.message },
      };
    }

    await this.recorder.recordOutcome({
      operation,
      source,
      target: result.targetPath || undefined,
      success: result.outcome === 'moved',
      skipped: result.outcome === 'skipped',
      error: result.error ? `${result.error.code}: ${result.error.message}` : undefined,
    });

    return result;
  }

  /**
   * Places every eligible file directly inside `sourceDir`.
   *
   * - subdirectories are neither entered nor counted
   * - hidden/system names add to `skipped` but not to `total`
   * - excluded, out-of-range and unreadable files are counted and skipped
   * - a failing file never stops the batch
   *
   * Throws when `sourceDir` itself cannot be listed.
   */
  async placeAll(
    sourceDir: string,
    targetRoot: string,
    ruleSet: RuleSet,
    options: PlaceAllOptions = {}
  ): Promise<BatchSummary> {
    const root = path.resolve(sourceDir);
    const operation = options.operation ?? OPERATION_ORGANIZE;
    const summary: BatchSummary = { total: 0, success: 0, failed: 0, skipped: 0, results: [] };

    const entries = await this.listOrThrow(root);

    this.logger.info(`Organizing ${root} -> ${path.resolve(targetRoot)} (${entries.length} entries)`);

    for (const entry of entries) {
      if (options.signal?.aborted) {
        this.logger.warn(`Stop requested, ${root} left partially organized`);
        break;
      }

      if (!entry.isFile) {
        this.logger.debug(`Skipping directory: ${entry.name}`);
        continue;
      }

      if (isHiddenName(entry.name)) {
        this.logger.debug(`Skipping hidden file: ${entry.name}`);
        summary.skipped++;
        continue;
      }

      summary.total++;
      const filePath = path.join(root, entry.name);

      const skipReason = await this.eligibilityProblem(filePath, entry.name, ruleSet);
      if (skipReason) {
        this.logger.info(`Skipping ${entry.name}: ${skipReason}`);
        summary.skipped++;
        continue;
      }

      const result = await this.placeFile(filePath, targetRoot, ruleSet, operation);
      summary.results.push(result);
      if (result.outcome === 'moved') summary.success++;
      else if (result.outcome === 'skipped') summary.skipped++;
      else summary.failed++;
    }

    this.logger.info(
      `Finished ${root}: ${summary.total} files, ${summary.success} moved, ${summary.failed} failed, ${summary.skipped} skipped`
    );
    return summary;
  }

  /**
   * Dry run of placeAll: where each eligible file would go.
   */
  async preview(sourceDir: string, targetRoot: string, ruleSet: RuleSet): Promise<PreviewEntry[]> {
    const root = path.resolve(sourceDir);
    const target = path.resolve(targetRoot);
    const entries = await this.listOrThrow(root);
    const preview: PreviewEntry[] = [];

    for (const entry of entries) {
      if (!entry.isFile || isHiddenName(entry.name)) continue;

      const filePath = path.join(root, entry.name);
      if (await this.eligibilityProblem(filePath, entry.name, ruleSet)) continue;

      try {
        const record = await readFileRecord(filePath);
        const category = classify(record, ruleSet);
        preview.push({
          sourcePath: record.path,
          fileName: record.name,
          category,
          relativeDirectory: path.relative(target, targetDirectoryFor(record, category, ruleSet, target)),
          sizeBytes: record.sizeBytes,
          extension: record.extension,
        });
      } catch (error) {
        this.logger.warn(`Cannot preview ${filePath}: ${errorMessage(error)}`);
      }
    }

    return preview;
  }

  /**
   * Counts and sizes of the non-hidden files directly inside `directory`.
   */
  async statistics(directory: string, ruleSet: RuleSet): Promise<DirectoryStats> {
    const root = path.resolve(directory);
    const entries = await this.listOrThrow(root);
    const stats: DirectoryStats = { totalFiles: 0, totalSize: 0, byExtension: {}, byCategory: {} };

    for (const entry of entries) {
      if (!entry.isFile || isHiddenName(entry.name)) continue;

      const filePath = path.join(root, entry.name);
      try {
        const record = await readFileRecord(filePath);
        const category = classify(record, ruleSet);
        stats.totalFiles++;
        stats.totalSize += record.sizeBytes;
        stats.byExtension[record.extension] = (stats.byExtension[record.extension] ?? 0) + 1;
        stats.byCategory[category] = (stats.byCategory[category] ?? 0) + 1;
      } catch (error) {
        this.logger.warn(`Cannot read ${filePath}: ${errorMessage(error)}`);
      }
    }

    return stats;
  }

  private async listOrThrow(root: string): Promise<DirectoryEntry[]> {
    try {
      return await this.enumerator.listImmediateChildren(root);
    } catch (error) {
      this.logger.error(`Cannot read ${root}: ${errorMessage(error)}`);
      throw toPlacementError(error);
    }
  }

  /**
   * Why a file is left out of a batch, or null when it should be placed.
   * A file that vanished returns null so placeFile records the failure.
   */
  async eligibilityProblem(filePath: string, name: string, ruleSet: RuleSet): Promise<string | null> {
    const byName = ruleSet.exclusionReason(name, path.extname(name));
    if (byName) {
      return byName;
    }

    let stats: fs.Stats;
    try {
      await fs.promises.access(filePath, fs.constants.R_OK);
      stats = await fs.promises.stat(filePath);
    } catch (error) {
      const failure = toPlacementError(error);
      return failure.code === 'PermissionDenied' ? `not readable (${failure.message})` : null;
    }

    return ruleSet.sizeExclusionReason(stats.size);
  }
}

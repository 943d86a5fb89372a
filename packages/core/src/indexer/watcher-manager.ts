import * as path from 'path';
import type { PlacementResult } from '../contracts';
import { errorMessage } from '../errors';
import { silentLogger, type Logger } from '../logging/logger';
import type { PlacementEngine } from '../placement/engine';
import type { RuleSet } from '../rules/rule-set';
import { DEFAULT_SETTLE_DELAY_MS, DirectoryWatcher } from './watcher';

export const OPERATION_AUTO_ORGANIZE = 'auto-organize';

export interface WatcherManagerOptions {
  engine: PlacementEngine;
  /** Read on every arrival so rule changes apply without a restart. */
  getRuleSet: () => RuleSet;
  settleDelayMs?: number;
  logger?: Logger;
}

export type PlacementListener = (result: PlacementResult) => void;
export type WatchErrorListener = (directory: string, error: Error) => void;

/**
 * WatcherManager - one DirectoryWatcher per watched directory, wired to
 * the placement engine.
 *
 * Arrivals go through the same engine (and its directory lock) as batch
 * runs. Stopping drops pending arrivals; moves already running finish and
 * can be awaited with drain(). A watcher that fails is dropped and
 * reported through the watch error callback.
 */
export class WatcherManager {
  private readonly engine: PlacementEngine;
  private readonly getRuleSet: () => RuleSet;
  private readonly settleDelayMs: number;
  private readonly logger: Logger;
  private watchers: Map<string, DirectoryWatcher> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private onPlacedCallback: PlacementListener | null = null;
  private onWatchErrorCallback: WatchErrorListener | null = null;

  constructor(options: WatcherManagerOptions) {
    this.engine = options.engine;
    this.getRuleSet = options.getRuleSet;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Set callback for placement results (CLI output, notifications).
   */
  setOnPlacedCallback(callback: PlacementListener | null): void {
    this.onPlacedCallback = callback;
  }

  /**
   * Set callback for watchers that stopped on their own after an fs.watch error.
   */
  setOnWatchErrorCallback(callback: WatchErrorListener | null): void {
    this.onWatchErrorCallback = callback;
  }

  /**
   * Start watching `directory`, sorting arrivals under `targetRoot`
   * (the directory itself by default).
   */
  startWatching(directory: string, targetRoot: string = directory): void {
    const key = path.resolve(directory);
    this.stopWatching(key);

    const watcher = new DirectoryWatcher(key, (filePath) => this.handleArrival(filePath, targetRoot), {
      settleDelayMs: this.settleDelayMs,
      logger: this.logger.child('Watcher'),
      onError: (error) => this.handleWatchError(key, watcher, error),
    });
    watcher.start();
    this.watchers.set(key, watcher);
  }

  stopWatching(directory: string): void {
    const key = path.resolve(directory);
    const watcher = this.watchers.get(key);
    if (watcher) {
      watcher.stop();
      this.watchers.delete(key);
    }
  }

  stopAll(): void {
    for (const watcher of this.watchers.values()) {
      watcher.stop();
    }
    this.watchers.clear();
  }

  isWatching(directory: string): boolean {
    return this.watchers.get(path.resolve(directory))?.isWatching() ?? false;
  }

  getWatchedDirectories(): string[] {
    return [...this.watchers.keys()].filter((dir) => this.isWatching(dir));
  }

  /**
   * Resolves once every placement started so far has finished.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private handleWatchError(directory: string, watcher: DirectoryWatcher, error: Error): void {
    if (this.watchers.get(directory) === watcher) {
      this.watchers.delete(directory);
    }
    if (this.onWatchErrorCallback) {
      this.onWatchErrorCallback(directory, error);
    }
  }

  private handleArrival(filePath: string, targetRoot: string): void {
    const task = this.placeArrival(filePath, targetRoot).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  private async placeArrival(filePath: string, targetRoot: string): Promise<void> {
    try {
      const ruleSet = this.getRuleSet();
      const skipReason = await this.engine.eligibilityProblem(filePath, path.basename(filePath), ruleSet);
      if (skipReason) {
        this.logger.debug(`Ignoring ${filePath}: ${skipReason}`);
        return;
      }

      const result = await this.engine.placeFile(filePath, targetRoot, ruleSet, OPERATION_AUTO_ORGANIZE);
      if (this.onPlacedCallback) {
        this.onPlacedCallback(result);
      }
    } catch (error) {
      // Keep watching even if one arrival fails
      this.logger.error(`Error handling ${filePath}: ${errorMessage(error)}`);
    }
  }
}

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors';
import { silentLogger, type Logger } from '../logging/logger';
import { isHiddenName } from '../rules/rule-set';

export const DEFAULT_SETTLE_DELAY_MS = 1000;

export type FileArrivedHandler = (filePath: string) => void;
export type WatchErrorHandler = (error: Error) => void;

export interface DirectoryWatcherOptions {
  /** Quiet period after the last event for a path before it is reported. */
  settleDelayMs?: number;
  logger?: Logger;
  /** Called after the watcher has stopped itself because fs.watch failed. */
  onError?: WatchErrorHandler;
}

/**
 * DirectoryWatcher - reports files that appear directly inside a directory.
 *
 * Uses fs.watch without recursion. Only `rename` events (a name appearing
 * or disappearing) start a timer; `change` events restart a timer that is
 * already pending, so a file still being written is reported once, after
 * it has been quiet for the settle delay. Edits to files that were already
 * there are not reported. Hidden names and directories are ignored.
 */
export class DirectoryWatcher {
  private readonly directory: string;
  private readonly onFileArrived: FileArrivedHandler;
  private readonly settleDelayMs: number;
  private readonly logger: Logger;
  private readonly onError: WatchErrorHandler | null;
  private watcher: fs.FSWatcher | null = null;
  private pendingEvents: Map<string, NodeJS.Timeout> = new Map();

  constructor(directory: string, onFileArrived: FileArrivedHandler, options: DirectoryWatcherOptions = {}) {
    this.directory = path.resolve(directory);
    this.onFileArrived = onFileArrived;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.logger = options.logger ?? silentLogger;
    this.onError = options.onError ?? null;
  }

  /**
   * Start watching. Throws when the directory is missing or not a directory.
   */
  start(): void {
    if (this.watcher) {
      this.logger.warn(`Already watching ${this.directory}`);
      return;
    }

    const stats = fs.statSync(this.directory);
    if (!stats.isDirectory()) {
      throw new Error(`Not a directory: ${this.directory}`);
    }

    this.watcher = fs.watch(this.directory, { recursive: false }, (eventType, filename) => {
      this.handleRawEvent(eventType, filename);
    });
    this.watcher.on('error', (error) => {
      this.handleWatchError(error);
    });

    this.logger.info(`Started watching ${this.directory}`);
  }

  /**
   * Stop watching and drop every pending (not yet reported) path.
   */
  stop(): void {
    for (const timeout of this.pendingEvents.values()) {
      clearTimeout(timeout);
    }
    this.pendingEvents.clear();

    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
      this.logger.info(`Stopped watching ${this.directory}`);
    }
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  getDirectory(): string {
    return this.directory;
  }

  pendingCount(): number {
    return this.pendingEvents.size;
  }

  private handleRawEvent(eventType: fs.WatchEventType, filename: string | Buffer | null): void {
    if (!filename) {
      return;
    }
    const name = filename.toString();
    if (isHiddenName(name)) {
      return;
    }

    const filePath = path.join(this.directory, name);
    if (eventType === 'rename' || this.pendingEvents.has(filePath)) {
      this.debounce(filePath);
    }
  }

  private handleWatchError(error: Error): void {
    this.logger.error(`Watch error on ${this.directory}: ${errorMessage(error)}`);
    this.stop();
    if (this.onError) {
      this.onError(error);
    }
  }

  private debounce(filePath: string): void {
    const existing = this.pendingEvents.get(filePath);
    if (existing) {
      clearTimeout(existing);
    }

    const timeout = setTimeout(() => {
      this.pendingEvents.delete(filePath);
      this.report(filePath);
    }, this.settleDelayMs);

    this.pendingEvents.set(filePath, timeout);
  }

  private report(filePath: string): void {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(filePath);
    } catch {
      // Moved or deleted before it settled
      return;
    }
    if (!stats.isFile()) {
      return;
    }

    try {
      this.onFileArrived(filePath);
    } catch (error) {
      this.logger.warn(`Handler failed for ${filePath}: ${errorMessage(error)}`);
    }
  }
}

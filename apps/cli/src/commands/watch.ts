import * as path from 'path';
import pc from 'picocolors';
import { PlacementError, WatcherManager } from '@shelfwise/core';
import { getFlag, requirePositional, resolveFolder } from '../args';
import type { CliContext } from '../context';
import { formatResult } from '../format';

/**
 * Resolves on SIGINT/SIGTERM. Rejects when the watcher stops on its own.
 */
function waitForShutdown(manager: WatcherManager): Promise<NodeJS.Signals> {
  return new Promise((resolve, reject) => {
    const cleanup = (): void => {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
      manager.setOnWatchErrorCallback(null);
    };
    const onSignal = (signal: NodeJS.Signals): void => {
      cleanup();
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    manager.setOnWatchErrorCallback((directory, error) => {
      cleanup();
      reject(
        new PlacementError('IOFailure', `Stopped watching ${directory}: ${error.message}`, {
          path: directory,
          cause: error,
        })
      );
    });
  });
}

export async function runWatch(args: string[], ctx: CliContext): Promise<void> {
  const folder = resolveFolder(requirePositional(args, 'folder'));
  const target = path.resolve(getFlag(args, '--target') ?? folder);

  const manager = new WatcherManager({
    engine: ctx.engine(),
    getRuleSet: () => ctx.store.getRuleSet(),
    settleDelayMs: ctx.store.getSettings().monitor.delayMs,
    logger: ctx.logger.child('WatcherManager'),
  });
  manager.setOnPlacedCallback((result) => console.log(formatResult(result)));

  manager.startWatching(folder, target);
  console.log(`Watching ${pc.bold(folder)}`);
  console.log(pc.dim('New files are sorted as they arrive. Press Ctrl+C to stop.'));

  try {
    const signal = await waitForShutdown(manager);
    console.log(pc.yellow(`\n${signal} received, stopping...`));
  } finally {
    manager.stopAll();
    await manager.drain();
  }
}

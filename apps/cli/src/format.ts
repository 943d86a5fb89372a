import pc from 'picocolors';
import type { PlacementResult } from '@shelfwise/core';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * 1536 -> "1.5 KB". Two decimals at most.
 */
export function formatSize(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), SIZE_UNITS.length - 1);
  const value = Math.round((bytes / Math.pow(1024, exponent)) * 100) / 100;
  return `${value} ${SIZE_UNITS[exponent]}`;
}

export function formatResult(result: PlacementResult): string {
  switch (result.outcome) {
    case 'moved':
      return `${pc.green('✓')} ${result.source} -> ${result.targetPath}`;
    case 'skipped':
      return `${pc.yellow('-')} ${result.source} ${pc.dim(`(${result.error?.message ?? 'skipped'})`)}`;
    case 'failed':
      return `${pc.red('✗')} ${result.source}: ${result.error?.message ?? 'failed'}`;
  }
}

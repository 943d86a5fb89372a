import pc from 'picocolors';
import type { PreviewEntry } from '@shelfwise/core';
import { getFlag, getNumberFlag, requirePositional, resolveFolder } from '../args';
import type { CliContext } from '../context';
import { formatSize } from '../format';

const PER_CATEGORY_LIMIT = 10;

export async function runPreview(args: string[], ctx: CliContext): Promise<void> {
  const folder = resolveFolder(requirePositional(args, 'folder'));
  const target = getFlag(args, '--target') ?? folder;

  console.log(`Preview for ${folder}`);
  const entries = await ctx.engine().preview(folder, target, ctx.store.getRuleSet());
  printPreview(entries, getNumberFlag(args, '--limit', 50));
}

/**
 * Groups the first `limit` entries by target directory, showing at most
 * ten files per group.
 */
export function printPreview(entries: PreviewEntry[], limit: number): void {
  if (entries.length === 0) {
    console.log('Nothing to organize');
    return;
  }

  console.log(`\n${entries.length} files to organize:`);

  const groups = new Map<string, PreviewEntry[]>();
  for (const entry of entries.slice(0, limit)) {
    const group = groups.get(entry.relativeDirectory) ?? [];
    group.push(entry);
    groups.set(entry.relativeDirectory, group);
  }

  for (const [directory, files] of groups) {
    console.log(`\n${pc.bold(directory)} (${files.length} files)`);
    for (const file of files.slice(0, PER_CATEGORY_LIMIT)) {
      console.log(`  ${file.fileName} ${pc.dim(`(${formatSize(file.sizeBytes)})`)}`);
    }
    if (files.length > PER_CATEGORY_LIMIT) {
      console.log(pc.dim(`  ... and ${files.length - PER_CATEGORY_LIMIT} more`));
    }
  }

  if (entries.length > limit) {
    console.log(pc.dim(`\n... ${entries.length - limit} more files not shown`));
  }
}

import { hasFlag, requirePositional, resolveFolder } from '../args';
import type { CliContext } from '../context';
import { formatSize } from '../format';

const TOP_EXTENSIONS = 10;

export async function runStats(args: string[], ctx: CliContext): Promise<void> {
  const directory = resolveFolder(requirePositional(args, 'directory'), 'Directory');
  const stats = await ctx.engine().statistics(directory, ctx.store.getRuleSet());

  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }

  console.log(`Statistics for ${directory}\n`);
  console.log(`Total files: ${stats.totalFiles}`);
  console.log(`Total size:  ${formatSize(stats.totalSize)}`);

  console.log('\nBy category:');
  for (const [category, count] of Object.entries(stats.byCategory).sort(([a], [b]) => a.localeCompare(b))) {
    console.log(`  ${category}: ${count}`);
  }

  console.log(`\nBy extension (top ${TOP_EXTENSIONS}):`);
  const byCount = Object.entries(stats.byExtension).sort((a, b) => b[1] - a[1]);
  for (const [extension, count] of byCount.slice(0, TOP_EXTENSIONS)) {
    console.log(`  ${extension || '(none)'}: ${count}`);
  }
}

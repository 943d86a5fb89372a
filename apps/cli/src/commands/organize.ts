import * as path from 'path';
import pc from 'picocolors';
import { getFlag, getNumberFlag, hasFlag, requirePositional, resolveFolder } from '../args';
import type { CliContext } from '../context';
import { formatResult } from '../format';
import { printPreview } from './preview';

export async function runOrganize(args: string[], ctx: CliContext): Promise<void> {
  const folder = resolveFolder(requirePositional(args, 'folder'));
  const target = path.resolve(getFlag(args, '--target') ?? folder);
  const ruleSet = ctx.store.getRuleSet();

  if (hasFlag(args, '--dry-run')) {
    console.log(pc.dim('Dry run - no files will be moved'));
    const entries = await ctx.engine().preview(folder, target, ruleSet);
    printPreview(entries, getNumberFlag(args, '--limit', 50));
    return;
  }

  const controller = new AbortController();
  const stop = (): void => {
    console.log(pc.yellow('\nStopping after the current file...'));
    controller.abort();
  };
  process.once('SIGINT', stop);

  try {
    const summary = await ctx.engine().placeAll(folder, target, ruleSet, { signal: controller.signal });

    if (hasFlag(args, '--json')) {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }

    for (const result of summary.results) {
      if (result.outcome !== 'moved' || hasFlag(args, '--list')) {
        console.log(formatResult(result));
      }
    }

    console.log(`\n${pc.bold('Done')} ${folder}`);
    console.log(`  Total files: ${summary.total}`);
    console.log(`  Organized:   ${pc.green(String(summary.success))}`);
    console.log(`  Failed:      ${summary.failed > 0 ? pc.red(String(summary.failed)) : '0'}`);
    console.log(`  Skipped:     ${summary.skipped}`);
  } finally {
    process.removeListener('SIGINT', stop);
  }
}

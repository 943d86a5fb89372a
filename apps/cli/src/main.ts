import pc from 'picocolors';
import { PlacementError, errorMessage } from '@shelfwise/core';
import { splitGlobalOptions, UsageError } from './args';
import { createContext, type CliContext } from './context';
import { runConfig } from './commands/config';
import { runLogs } from './commands/logs';
import { runOrganize } from './commands/organize';
import { runPreview } from './commands/preview';
import { runStats } from './commands/stats';
import { runWatch } from './commands/watch';

export const USAGE = `
Shelfwise - sort a folder's files into category folders

Usage:
  shelfwise organize <folder> [--target <dir>] [--dry-run] [--json] [--list]
                                             Sort the files directly inside <folder>
  shelfwise watch <folder> [--target <dir>]  Sort new files as they arrive
  shelfwise preview <folder> [--limit N]     Show where files would go
  shelfwise stats <folder> [--json]          Count files by category and extension
  shelfwise config --list | --reset | --export FILE | --import FILE
                 | --add-rule CATEGORY EXTS | --remove-rule CATEGORY
  shelfwise logs --show [N] | --export FILE [--since YYYY-MM-DD] | --clear [DAYS] | --stats

Options:
  --verbose, -v        Debug logging
  --quiet, -q          Errors only
  --config-file FILE   Use another settings file
  --target <dir>       Where category folders are created (default: <folder>)
`.trim();

type Command = (args: string[], ctx: CliContext) => Promise<void>;

const COMMANDS = new Map<string, Command>([
  ['organize', runOrganize],
  ['watch', runWatch],
  ['preview', runPreview],
  ['stats', runStats],
  ['config', runConfig],
  ['logs', runLogs],
]);

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export async function run(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof splitGlobalOptions>;
  try {
    parsed = splitGlobalOptions(argv);
  } catch (error) {
    console.error(pc.red(errorMessage(error)));
    return 1;
  }

  const [command, ...args] = parsed.rest;

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    console.log(USAGE);
    return 0;
  }

  const handler = COMMANDS.get(command);
  if (!handler) {
    console.error(`Unknown command: ${command}\n`);
    console.log(USAGE);
    return 1;
  }

  const ctx = createContext(parsed.options);
  try {
    await handler(args, ctx);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(pc.red(error.message));
    } else if (error instanceof PlacementError) {
      console.error(pc.red(`${error.code}: ${error.message}`));
    } else {
      console.error(pc.red(`Error: ${errorMessage(error)}`));
      if (parsed.options.verbose && error instanceof Error && error.stack) {
        console.error(pc.dim(error.stack));
      }
    }
    return 1;
  } finally {
    await ctx.close();
  }
}

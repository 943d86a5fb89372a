import pc from 'picocolors';
import type { OperationRecord } from '@shelfwise/core';
import { getFlag, getNumberFlag, hasFlag, UsageError } from '../args';
import type { CliContext } from '../context';

const LOGS_USAGE = 'logs needs one of --show N, --export FILE [--since YYYY-MM-DD], --clear [DAYS], --stats';
const DEFAULT_RETENTION_DAYS = 30;

function parseDay(raw: string): number {
  const time = Date.parse(raw);
  if (Number.isNaN(time)) {
    throw new UsageError(`Invalid date "${raw}", expected YYYY-MM-DD`);
  }
  return time;
}

export function formatOperation(op: OperationRecord): string {
  const when = new Date(op.created_at).toISOString().replace('T', ' ').slice(0, 19);
  const status =
    op.status === 'success' ? pc.green(op.status) : op.status === 'failed' ? pc.red(op.status) : pc.yellow(op.status);
  const target = op.target ? ` -> ${op.target}` : '';
  const error = op.error ? pc.dim(` (${op.error})`) : '';
  return `${when} ${op.operation} ${status} ${op.source}${target}${error}`;
}

export async function runLogs(args: string[], ctx: CliContext): Promise<void> {
  const db = ctx.db();

  if (hasFlag(args, '--show')) {
    const limit = getNumberFlag(args, '--show', 50);
    const operations = await db.getRecentOperations(limit);
    console.log(`Last ${operations.length} operations:`);
    for (const op of [...operations].reverse()) {
      console.log(formatOperation(op));
    }
    return;
  }

  const exportFile = getFlag(args, '--export');
  if (exportFile) {
    const since = getFlag(args, '--since');
    const count = await db.exportOperations(exportFile, since ? { since: parseDay(since) } : {});
    console.log(`Exported ${count} operations to ${exportFile}`);
    return;
  }

  const clearIdx = args.indexOf('--clear');
  if (clearIdx !== -1) {
    const rawDays = args[clearIdx + 1];
    const days = rawDays && !rawDays.startsWith('-') ? Number(rawDays) : DEFAULT_RETENTION_DAYS;
    if (!Number.isInteger(days) || days < 0) {
      throw new UsageError(`--clear expects a number of days, got "${rawDays}"`);
    }
    const removed = await db.clearOperationsOlderThan(days);
    console.log(`Removed ${removed} operations older than ${days} days`);
    return;
  }

  if (hasFlag(args, '--stats')) {
    const stats = await db.getOperationStats();
    console.log('Operation statistics:');
    console.log(`  Total:     ${stats.total}`);
    console.log(`  Succeeded: ${stats.succeeded}`);
    console.log(`  Failed:    ${stats.failed}`);
    console.log(`  Skipped:   ${stats.skipped}`);
    for (const [operation, count] of Object.entries(stats.byOperation)) {
      console.log(`  ${operation}: ${count}`);
    }
    return;
  }

  throw new UsageError(LOGS_USAGE);
}

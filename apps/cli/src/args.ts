import * as fs from 'fs';
import * as path from 'path';

/**
 * Minimal argv helpers. Flags that take a value are listed in VALUE_FLAGS
 * so their values are not mistaken for positionals.
 */
const VALUE_FLAGS = new Set([
  '--target',
  '--limit',
  '--config-file',
  '--export',
  '--import',
  '--remove-rule',
  '--show',
  '--since',
]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some((flag) => args.includes(flag));
}

export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx >= args.length - 1) return undefined;
  return args[idx + 1];
}

export function getNumberFlag(args: string[], flag: string, fallback: number): number {
  const raw = getFlag(args, flag);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (!arg.startsWith('-')) {
      out.push(arg);
    }
  }
  return out;
}

export function requirePositional(args: string[], name: string): string {
  const [value] = positionals(args);
  if (!value) {
    throw new UsageError(`Missing <${name}> argument`);
  }
  return value;
}

export function resolveFolder(raw: string, label: string = 'Folder'): string {
  const folder = path.resolve(raw);
  if (!fs.existsSync(folder)) {
    throw new UsageError(`${label} does not exist: ${folder}`);
  }
  return folder;
}

export interface GlobalOptions {
  verbose: boolean;
  quiet: boolean;
  configFile?: string;
}

/**
 * Pulls --verbose/-v, --quiet/-q and --config-file out of argv.
 */
export function splitGlobalOptions(argv: string[]): { options: GlobalOptions; rest: string[] } {
  const options: GlobalOptions = { verbose: false, quiet: false };
  const rest: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--quiet' || arg === '-q') {
      options.quiet = true;
    } else if (arg === '--config-file') {
      const value = argv[i + 1];
      if (!value) {
        throw new UsageError('--config-file expects a path');
      }
      options.configFile = value;
      i++;
    } else {
      rest.push(arg);
    }
  }

  return { options, rest };
}

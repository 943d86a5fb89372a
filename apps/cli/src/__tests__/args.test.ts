import * as path from 'path';
import * as os from 'os';
import { describe, expect, it } from 'vitest';
import {
  UsageError,
  getFlag,
  getNumberFlag,
  hasFlag,
  positionals,
  requirePositional,
  resolveFolder,
  splitGlobalOptions,
} from '../args';

describe('argv helpers', () => {
  it('reads flags and their values', () => {
    const args = ['organize', 'inbox', '--target', 'out', '--json'];

    expect(hasFlag(args, '--json')).toBe(true);
    expect(hasFlag(args, '--list', '--dry-run')).toBe(false);
    expect(getFlag(args, '--target')).toBe('out');
    expect(getFlag(args, '--limit')).toBeUndefined();
  });

  it('ignores a value flag at the end of argv', () => {
    expect(getFlag(['--target'], '--target')).toBeUndefined();
  });

  it('parses numeric flags and rejects bad ones', () => {
    expect(getNumberFlag(['--limit', '5'], '--limit', 50)).toBe(5);
    expect(getNumberFlag([], '--limit', 50)).toBe(50);
    expect(() => getNumberFlag(['--limit', 'many'], '--limit', 50)).toThrow(UsageError);
    expect(() => getNumberFlag(['--limit', '-1'], '--limit', 50)).toThrow(
      '--limit expects a non-negative integer, got "-1"'
    );
  });

  it('skips flag values when collecting positionals', () => {
    expect(positionals(['--target', 'out', 'inbox', '--json', 'extra'])).toEqual(['inbox', 'extra']);
    expect(requirePositional(['--json', 'inbox'], 'folder')).toBe('inbox');
    expect(() => requirePositional(['--target', 'out'], 'folder')).toThrow('Missing <folder> argument');
  });

  it('resolves existing folders and rejects missing ones', () => {
    expect(resolveFolder(os.tmpdir())).toBe(path.resolve(os.tmpdir()));
    const missing = path.join(os.tmpdir(), 'shelfwise-no-such-folder-for-tests');
    expect(() => resolveFolder(missing, 'Directory')).toThrow(`Directory does not exist: ${missing}`);
  });
});

describe('splitGlobalOptions', () => {
  it('separates global options from the command line', () => {
    expect(splitGlobalOptions(['-v', 'organize', '--config-file', 'rules.json', 'inbox', '-q'])).toEqual({
      options: { verbose: true, quiet: true, configFile: 'rules.json' },
      rest: ['organize', 'inbox'],
    });
  });

  it('requires a path after --config-file', () => {
    expect(() => splitGlobalOptions(['stats', '--config-file'])).toThrow('--config-file expects a path');
  });
});

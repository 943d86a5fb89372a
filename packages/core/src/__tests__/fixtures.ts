import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { Logger } from '../logging/logger';

export function makeTempDir(prefix: string = 'shelfwise-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Writes `content` to `dir/relativePath`, creating parent folders.
 */
export function writeFile(dir: string, relativePath: string, content: string | Buffer = ''): string {
  const filePath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function readText(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

export interface SpyLogger extends Logger {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

export function createSpyLogger(): SpyLogger {
  const logger: SpyLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

/**
 * Runs `fn` and returns what it threw; fails the test when nothing was thrown.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { silentLogger } from '../../logging/logger';
import { makeTempDir, readText, removeDir } from '../../__tests__/fixtures';
import { DatabaseManager } from '..';
import { runMigrations } from '../migrations';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = Date.UTC(2024, 5, 15, 12, 0, 0);

describe('runMigrations', () => {
  it('applies every migration once', () => {
    const db = new Database(':memory:');

    expect(runMigrations(db, silentLogger)).toEqual([1, 2]);
    expect(runMigrations(db, silentLogger)).toEqual([]);

    db.close();
  });
});

describe('DatabaseManager', () => {
  let dir: string;
  let manager: DatabaseManager;

  beforeEach(() => {
    dir = makeTempDir();
    manager = new DatabaseManager(path.join(dir, 'nested', 'audit.db'));
  });

  afterEach(async () => {
    await manager.close();
    removeDir(dir);
  });

  it('creates the database file and its folder', () => {
    expect(fs.existsSync(path.join(dir, 'nested', 'audit.db'))).toBe(true);
    expect(manager.getPath()).toBe(path.join(dir, 'nested', 'audit.db'));
  });

  it('returns the newest operations first', async () => {
    await manager.insertOperation({ operation: 'organize', source: '/in/a.jpg', target: '/out/a.jpg', status: 'success', createdAt: NOW - 2000 });
    await manager.insertOperation({ operation: 'organize', source: '/in/b.pdf', status: 'failed', error: 'NotFound: gone', createdAt: NOW });
    await manager.insertOperation({ operation: 'auto-organize', source: '/in/c.txt', status: 'skipped', createdAt: NOW });

    const recent = await manager.getRecentOperations(2);

    expect(recent.map((op) => op.source)).toEqual(['/in/c.txt', '/in/b.pdf']);
    expect(recent[1]).toMatchObject({
      operation: 'organize',
      target: null,
      status: 'failed',
      error: 'NotFound: gone',
      created_at: NOW,
    });
  });

  it('counts operations by status and kind', async () => {
    await manager.insertOperation({ operation: 'organize', source: '/in/a', status: 'success' });
    await manager.insertOperation({ operation: 'organize', source: '/in/b', status: 'success' });
    await manager.insertOperation({ operation: 'organize', source: '/in/c', status: 'failed' });
    await manager.insertOperation({ operation: 'auto-organize', source: '/in/d', status: 'skipped' });

    expect(await manager.getOperationStats()).toEqual({
      total: 4,
      succeeded: 2,
      failed: 1,
      skipped: 1,
      byOperation: { 'auto-organize': 1, organize: 3 },
    });
  });

  it('exports operations oldest first as JSON lines', async () => {
    await manager.insertOperation({ operation: 'organize', source: '/in/new', status: 'success', createdAt: NOW });
    await manager.insertOperation({ operation: 'organize', source: '/in/old', status: 'success', createdAt: NOW - 3 * DAY_MS });
    await manager.insertOperation({ operation: 'organize', source: '/in/mid', status: 'failed', createdAt: NOW - DAY_MS });
    const outFile = path.join(dir, 'exports', 'ops.jsonl');

    const all = await manager.exportOperations(outFile);
    const allSources = readText(outFile).trim().split('\n').map((line) => JSON.parse(line).source);

    expect(all).toBe(3);
    expect(allSources).toEqual(['/in/old', '/in/mid', '/in/new']);

    const recent = await manager.exportOperations(outFile, { since: NOW - 2 * DAY_MS });
    expect(recent).toBe(2);
    expect(readText(outFile).trim().split('\n').map((line) => JSON.parse(line).source)).toEqual(['/in/mid', '/in/new']);
  });

  it('writes an empty file when nothing matches', async () => {
    const outFile = path.join(dir, 'empty.jsonl');

    expect(await manager.exportOperations(outFile)).toBe(0);
    expect(readText(outFile)).toBe('');
  });

  it('clears operations older than the cutoff', async () => {
    await manager.insertOperation({ operation: 'organize', source: '/in/old', status: 'success', createdAt: NOW - 40 * DAY_MS });
    await manager.insertOperation({ operation: 'organize', source: '/in/recent', status: 'success', createdAt: NOW - 5 * DAY_MS });

    expect(await manager.clearOperationsOlderThan(30, NOW)).toBe(1);
    expect((await manager.getRecentOperations()).map((op) => op.source)).toEqual(['/in/recent']);
  });

  it('keeps its data across reopening', async () => {
    await manager.insertOperation({ operation: 'organize', source: '/in/a', status: 'success' });
    await manager.close();

    manager = new DatabaseManager(path.join(dir, 'nested', 'audit.db'));

    expect((await manager.getOperationStats()).total).toBe(1);
  });
});

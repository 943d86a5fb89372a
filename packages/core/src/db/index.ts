import * as path from 'path';
import * as fs from 'fs';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { runMigrations } from './migrations';
import { OperationRecordSchema } from '../contracts';
import type { OperationRecord, OperationStats, OperationStatus } from '../contracts';
import { silentLogger, type Logger } from '../logging/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface NewOperation {
  operation: string;
  source: string;
  target?: string | null;
  status: OperationStatus;
  error?: string | null;
  createdAt?: number;
}

export interface ExportRange {
  since?: number;
  until?: number;
}

const CountRowSchema = z.object({ status: z.string(), count: z.number() });
const OperationCountRowSchema = z.object({ operation: z.string(), count: z.number() });

/**
 * DatabaseManager - SQLite audit trail of file operations.
 */
export class DatabaseManager {
  private db: InstanceType<typeof Database> | null = null;
  private readonly dbPath: string;
  private readonly logger: Logger;

  constructor(dbPath: string, logger: Logger = silentLogger) {
    this.dbPath = dbPath;
    this.logger = logger;
    this.init();
  }

  private init(): void {
    if (this.dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');

    runMigrations(this.db, this.logger);
  }

  private ensureReady(): InstanceType<typeof Database> {
    if (!this.db) {
      throw new Error('Database not initialized');
    }
    return this.db;
  }

  getPath(): string {
    return this.dbPath;
  }

  // ============================================================================
  // Operations
  // ============================================================================

  async insertOperation(entry: NewOperation): Promise<number> {
    const db = this.ensureReady();
    const result = db.prepare(`
      INSERT INTO operations (operation, source, target, status, error, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      entry.operation,
      entry.source,
      entry.target ?? null,
      entry.status,
      entry.error ?? null,
      entry.createdAt ?? Date.now()
    );
    return Number(result.lastInsertRowid);
  }

  /**
   * Most recent operations first.
   */
  async getRecentOperations(limit: number = 50): Promise<OperationRecord[]> {
    const db = this.ensureReady();
    const rows = db.prepare(`
      SELECT id, operation, source, target, status, error, created_at
      FROM operations
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `).all(limit);
    return rows.map((row) => OperationRecordSchema.parse(row));
  }

  async getOperationStats(): Promise<OperationStats> {
    const db = this.ensureReady();

    const stats: OperationStats = { total: 0, succeeded: 0, failed: 0, skipped: 0, byOperation: {} };

    const statusRows = db.prepare(`
      SELECT status, COUNT(*) AS count
      FROM operations
      GROUP BY status
    `).all();
    for (const raw of statusRows) {
      const row = CountRowSchema.parse(raw);
      stats.total += row.count;
      if (row.status === 'success') stats.succeeded += row.count;
      else if (row.status === 'failed') stats.failed += row.count;
      else if (row.status === 'skipped') stats.skipped += row.count;
    }

    const operationRows = db.prepare(`
      SELECT operation, COUNT(*) AS count
      FROM operations
      GROUP BY operation
      ORDER BY operation
    `).all();
    for (const raw of operationRows) {
      const row = OperationCountRowSchema.parse(raw);
      stats.byOperation[row.operation] = row.count;
    }

    return stats;
  }

  /**
   * Writes operations (oldest first) to a JSON-lines file.
   * Returns the number of rows written.
   */
  async exportOperations(outputFile: string, range: ExportRange = {}): Promise<number> {
    const db = this.ensureReady();
    const rows = db.prepare(`
      SELECT id, operation, source, target, status, error, created_at
      FROM operations
      WHERE created_at >= ? AND created_at <= ?
      ORDER BY created_at ASC, id ASC
    `).all(range.since ?? 0, range.until ?? Number.MAX_SAFE_INTEGER);

    const lines = rows.map((row) => JSON.stringify(OperationRecordSchema.parse(row)));
    fs.mkdirSync(path.dirname(path.resolve(outputFile)), { recursive: true });
    fs.writeFileSync(outputFile, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf-8');
    return lines.length;
  }

  /**
   * Deletes operations older than the given number of days.
   * Returns the number of rows removed.
   */
  async clearOperationsOlderThan(days: number, now: number = Date.now()): Promise<number> {
    const db = this.ensureReady();
    const cutoff = now - days * DAY_MS;
    const result = db.prepare(`DELETE FROM operations WHERE created_at < ?`).run(cutoff);
    if (result.changes > 0) {
      this.logger.info(`Removed ${result.changes} operations older than ${days} days`);
    }
    return result.changes;
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

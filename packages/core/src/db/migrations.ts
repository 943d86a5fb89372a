import Database from 'better-sqlite3';
import { z } from 'zod';
import type { Logger } from '../logging/logger';

interface Migration {
  version: number;
  name: string;
  up: (db: InstanceType<typeof Database>) => void;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      // Operations table - one row per recorded outcome
      db.prepare(`
        CREATE TABLE IF NOT EXISTS operations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          operation TEXT NOT NULL,
          source TEXT NOT NULL,
          target TEXT,
          status TEXT NOT NULL,
          error TEXT,
          created_at INTEGER NOT NULL
        )
      `).run();

      db.prepare(`CREATE INDEX IF NOT EXISTS idx_operations_created_at ON operations(created_at)`).run();
    },
  },
  {
    version: 2,
    name: 'index_operations_status',
    up: (db) => {
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_operations_status ON operations(status)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_operations_operation ON operations(operation)`).run();
    },
  },
];

const AppliedVersionSchema = z.object({ version: z.number() });

export function runMigrations(db: InstanceType<typeof Database>, logger: Logger): number[] {
  // Ensure schema_migrations table exists
  db.prepare(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `).run();

  const applied = new Set<number>();
  for (const row of db.prepare(`SELECT version FROM schema_migrations`).all()) {
    applied.add(AppliedVersionSchema.parse(row).version);
  }

  const newlyApplied: number[] = [];
  for (const migration of migrations) {
    if (!applied.has(migration.version)) {
      logger.debug(`Applying migration ${migration.version}: ${migration.name}`);
      db.transaction(() => {
        migration.up(db);
        db.prepare(`
          INSERT INTO schema_migrations (version, name, applied_at)
          VALUES (?, ?, ?)
        `).run(migration.version, migration.name, Date.now());
      })();
      newlyApplied.push(migration.version);
    }
  }

  return newlyApplied;
}

import * as path from 'path';
import {
  ConsoleLogger,
  DatabaseManager,
  OutcomeRecorder,
  PlacementEngine,
  RuleStore,
  loadEnvironment,
  type Environment,
  type LogLevel,
  type Logger,
} from '@shelfwise/core';
import type { GlobalOptions } from './args';

export interface CliContext {
  env: Environment;
  logger: Logger;
  store: RuleStore;
  /** Opened on first use; commands that never log outcomes skip SQLite. */
  db(): DatabaseManager;
  engine(): PlacementEngine;
  close(): Promise<void>;
}

function levelFor(options: GlobalOptions, env: Environment): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  return env.logLevel;
}

export function createContext(options: GlobalOptions): CliContext {
  const env = loadEnvironment();
  if (options.configFile) {
    env.configPath = path.resolve(options.configFile);
  }

  const logger = new ConsoleLogger('Shelfwise', levelFor(options, env));
  for (const warning of env.warnings) {
    logger.warn(warning);
  }

  const store = new RuleStore(env.configPath, logger.child('RuleStore'));
  let db: DatabaseManager | null = null;
  let engine: PlacementEngine | null = null;

  const openDb = (): DatabaseManager => {
    if (!db) {
      db = new DatabaseManager(env.dbPath, logger.child('Audit'));
    }
    return db;
  };

  return {
    env,
    logger,
    store,
    db: openDb,
    engine: () => {
      if (!engine) {
        const recorder = new OutcomeRecorder(logger.child('Audit'), openDb());
        engine = new PlacementEngine({ logger: logger.child('Engine'), recorder });
      }
      return engine;
    },
    close: async () => {
      if (db) {
        await db.close();
        db = null;
      }
    },
  };
}

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { isLogLevel, type LogLevel } from '../logging/logger';

export const APP_DIR_NAME = '.shelfwise';

export interface Environment {
  configPath: string;
  dbPath: string;
  logLevel: LogLevel;
  /** .env file that was loaded, if any. */
  envFile: string | null;
  /** Problems found while reading the environment (already resolved to defaults). */
  warnings: string[];
}

export interface EnvironmentOptions {
  /** Candidate .env files; the first one that exists wins. */
  envPaths?: string[];
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

const EnvSchema = z.object({
  SHELFWISE_CONFIG: z.string().min(1).optional(),
  SHELFWISE_DB: z.string().min(1).optional(),
  SHELFWISE_LOG_LEVEL: z.string().optional(),
});

export function appDataDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, APP_DIR_NAME);
}

function expandHome(value: string, homeDir: string): string {
  return value.startsWith('~') ? path.join(homeDir, value.slice(1)) : value;
}

/**
 * Loads the first .env found (cwd, then ~/.shelfwise/.env) into `env`
 * and resolves file locations and the log level from it.
 * Variables already set in the environment are not overridden.
 */
export function loadEnvironment(options: EnvironmentOptions = {}): Environment {
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;
  const candidates = options.envPaths ?? [
    path.join(process.cwd(), '.env'),
    path.join(appDataDir(homeDir), '.env'),
  ];

  let envFile: string | null = null;
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const values = dotenv.parse(fs.readFileSync(candidate));
    for (const [key, value] of Object.entries(values)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    envFile = candidate;
    break;
  }

  const warnings: string[] = [];
  const parsed = EnvSchema.safeParse(env);
  const vars = parsed.success ? parsed.data : {};
  if (!parsed.success) {
    warnings.push(`Ignoring invalid environment: ${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')}`);
  }

  let logLevel: LogLevel = 'info';
  const rawLevel = vars.SHELFWISE_LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      warnings.push(`Unknown SHELFWISE_LOG_LEVEL "${rawLevel}", using info`);
    }
  }

  return {
    configPath: path.resolve(expandHome(vars.SHELFWISE_CONFIG ?? path.join(appDataDir(homeDir), 'settings.json'), homeDir)),
    dbPath: path.resolve(expandHome(vars.SHELFWISE_DB ?? path.join(appDataDir(homeDir), 'shelfwise.db'), homeDir)),
    logLevel,
    envFile,
    warnings,
  };
}

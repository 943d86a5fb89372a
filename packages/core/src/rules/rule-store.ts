import * as fs from 'fs';
import * as path from 'path';
import defaultSettingsJson from './default-settings.json';
import { SettingsSchema } from '../contracts';
import type { Settings, SettingsSummary } from '../contracts';
import { PlacementError, errnoCode, errorMessage } from '../errors';
import { silentLogger, type Logger } from '../logging/logger';
import { RuleSet, normalizeExtension } from './rule-set';

/**
 * Built-in settings, validated once at load.
 */
export function defaultSettings(): Settings {
  return SettingsSchema.parse(structuredClone(defaultSettingsJson));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge of `override` onto `base`. `fileTypes` is taken whole
 * from the override so a removed category stays removed.
 */
export function mergeSettings(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    if (key !== 'fileTypes' && isPlainObject(current) && isPlainObject(value)) {
      out[key] = mergeSettings(current, value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

function describeIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validates raw JSON against the settings schema after filling gaps from
 * the defaults. Throws ConfigInvalid.
 */
export function parseSettings(raw: unknown): Settings {
  if (!isPlainObject(raw)) {
    throw new PlacementError('ConfigInvalid', 'Settings must be a JSON object');
  }
  const defaults: Record<string, unknown> = { ...defaultSettings() };
  const result = SettingsSchema.safeParse(mergeSettings(defaults, raw));
  if (!result.success) {
    throw new PlacementError('ConfigInvalid', `Invalid settings: ${describeIssues(result.error)}`);
  }
  return result.data;
}

function readJsonFile(filePath: string): unknown {
  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new PlacementError('ConfigInvalid', `${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * RuleStore - owns the settings file and hands out immutable RuleSets.
 *
 * All mutation goes through this class; callers only ever see snapshots.
 */
export class RuleStore {
  private readonly configPath: string;
  private readonly logger: Logger;
  private settings: Settings;
  private ruleSet: RuleSet;

  constructor(configPath: string, logger: Logger = silentLogger) {
    this.configPath = path.resolve(configPath);
    this.logger = logger;
    this.settings = this.load();
    this.ruleSet = RuleSet.fromSettings(this.settings);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getSettings(): Settings {
    return structuredClone(this.settings);
  }

  getRuleSet(): RuleSet {
    return this.ruleSet;
  }

  /**
   * Replaces (or creates) a category's extension list and saves.
   * Returns the new RuleSet; RuleSets handed out earlier are unchanged.
   */
  addRule(category: string, extensions: readonly string[]): RuleSet {
    const name = category.trim();
    if (!name) {
      throw new PlacementError('ConfigInvalid', 'Category name must not be empty');
    }
    const normalized = [...new Set(extensions.map(normalizeExtension).filter((ext) => ext !== ''))];
    if (normalized.length === 0) {
      throw new PlacementError('ConfigInvalid', `No valid extensions given for category "${name}"`);
    }

    this.replaceRuleSet(this.ruleSet.withRule(name, normalized));
    this.logger.info(`Rule set: ${name} -> ${normalized.join(', ')}`);
    return this.ruleSet;
  }

  /**
   * Returns false when the category did not exist.
   */
  removeRule(category: string): boolean {
    if (!this.ruleSet.categoryNames().includes(category)) {
      return false;
    }
    this.replaceRuleSet(this.ruleSet.withoutRule(category));
    this.logger.info(`Rule removed: ${category}`);
    return true;
  }

  reset(): void {
    this.update(defaultSettings());
    this.logger.info('Settings reset to defaults');
  }

  exportTo(filePath: string): void {
    this.writeJson(path.resolve(filePath), this.settings);
  }

  /**
   * Replaces the settings with a validated file. On ConfigInvalid the
   * current settings stay in effect.
   */
  importFrom(filePath: string): void {
    let raw: unknown;
    try {
      raw = readJsonFile(filePath);
    } catch (error) {
      if (error instanceof PlacementError) throw error;
      throw new PlacementError('ConfigInvalid', `Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    this.update(parseSettings(raw));
    this.logger.info(`Settings imported from ${filePath}`);
  }

  summary(): SettingsSummary {
    const fileTypes = Object.values(this.settings.fileTypes);
    return {
      totalCategories: fileTypes.length,
      totalExtensions: fileTypes.reduce((sum, exts) => sum + exts.length, 0),
      organizeByDate: this.settings.organizeByDate,
      defaultCategory: this.settings.defaultCategory,
    };
  }

  save(): void {
    this.writeJson(this.configPath, this.settings);
  }

  private update(settings: Settings): void {
    this.settings = settings;
    this.ruleSet = RuleSet.fromSettings(settings);
    this.save();
  }

  /**
   * Adopts a RuleSet derived from the current one; its categories become
   * the persisted fileTypes.
   */
  private replaceRuleSet(ruleSet: RuleSet): void {
    this.settings = { ...this.settings, fileTypes: ruleSet.toFileTypes() };
    this.ruleSet = ruleSet;
    this.save();
  }

  private writeJson(filePath: string, settings: Settings): void {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, `${JSON.stringify(settings, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new PlacementError('IOFailure', `Cannot write settings to ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Missing file means defaults. A broken file is reported and ignored.
   */
  private load(): Settings {
    try {
      return parseSettings(readJsonFile(this.configPath));
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.logger.debug(`No settings at ${this.configPath}, using defaults`);
      } else {
        this.logger.warn(`ConfigInvalid: ${errorMessage(error)}. Using default settings`);
      }
      return defaultSettings();
    }
  }
}

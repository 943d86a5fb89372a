import type { Settings } from '../contracts';

export const DEFAULT_DATE_FORMAT = '%Y-%m';

/**
 * Lower-cases an extension and gives it exactly one leading dot.
 * "PDF", ".pdf" and "..pdf" all become ".pdf"; blank input becomes "".
 */
export function normalizeExtension(extension: string): string {
  const bare = extension.trim().replace(/^\.+/, '').toLowerCase();
  return bare ? `.${bare}` : '';
}

/**
 * Hidden and system names ("." or "~" prefix) are never organized.
 */
export function isHiddenName(name: string): boolean {
  return name.startsWith('.') || name.startsWith('~');
}

function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`, 'i');
}

export interface RuleSetInit {
  /** Category name to extensions; iteration order decides ties. */
  rules: Record<string, readonly string[]>;
  defaultCategory: string;
  organizeByDate?: boolean;
  dateFormat?: string;
  excludedExtensions?: readonly string[];
  excludedPatterns?: readonly string[];
  minFileSize?: number;
  maxFileSize?: number;
}

/**
 * RuleSet - immutable category rules plus the file filters that go with them.
 *
 * An extension listed under several categories belongs to the first
 * category in iteration order.
 */
export class RuleSet {
  readonly defaultCategory: string;
  readonly organizeByDate: boolean;
  readonly dateFormat: string;
  readonly minFileSize: number;
  readonly maxFileSize: number;

  private readonly categories: ReadonlyMap<string, readonly string[]>;
  private readonly index: ReadonlyMap<string, string>;
  private readonly excludedExtensions: ReadonlySet<string>;
  private readonly excludedPatterns: readonly string[];
  private readonly excludedMatchers: readonly RegExp[];

  constructor(init: RuleSetInit) {
    const categories = new Map<string, readonly string[]>();
    const index = new Map<string, string>();

    for (const [category, extensions] of Object.entries(init.rules)) {
      const normalized = [...new Set(extensions.map(normalizeExtension).filter((ext) => ext !== ''))];
      categories.set(category, normalized);
      for (const ext of normalized) {
        if (!index.has(ext)) {
          index.set(ext, category);
        }
      }
    }

    this.categories = categories;
    this.index = index;
    this.defaultCategory = init.defaultCategory;
    this.organizeByDate = init.organizeByDate ?? false;
    this.dateFormat = init.dateFormat ?? DEFAULT_DATE_FORMAT;
    this.minFileSize = init.minFileSize ?? 0;
    this.maxFileSize = init.maxFileSize ?? 0;
    this.excludedExtensions = new Set(
      (init.excludedExtensions ?? []).map(normalizeExtension).filter((ext) => ext !== '')
    );
    this.excludedPatterns = [...(init.excludedPatterns ?? [])];
    this.excludedMatchers = this.excludedPatterns.map(patternToRegExp);
  }

  static fromSettings(settings: Settings): RuleSet {
    return new RuleSet({
      rules: settings.fileTypes,
      defaultCategory: settings.defaultCategory,
      organizeByDate: settings.organizeByDate,
      dateFormat: settings.dateFormat,
      excludedExtensions: settings.excludedExtensions,
      excludedPatterns: settings.excludedPatterns,
      minFileSize: settings.minFileSize,
      maxFileSize: settings.maxFileSize,
    });
  }

  /**
   * Category for an extension, separator- and case-insensitive.
   * Falls back to the default category.
   */
  categoryFor(extension: string): string {
    const ext = normalizeExtension(extension);
    return (ext && this.index.get(ext)) || this.defaultCategory;
  }

  categoryNames(): string[] {
    return [...this.categories.keys()];
  }

  extensionsFor(category: string): readonly string[] {
    return this.categories.get(category) ?? [];
  }

  /**
   * New RuleSet with the category's extensions replaced.
   * An existing category keeps its position.
   */
  withRule(category: string, extensions: readonly string[]): RuleSet {
    const rules = this.toFileTypes();
    rules[category] = [...extensions];
    return new RuleSet({ ...this.toInit(), rules });
  }

  withoutRule(category: string): RuleSet {
    const rules = this.toFileTypes();
    delete rules[category];
    return new RuleSet({ ...this.toInit(), rules });
  }

  /**
   * Reason a file is left alone by name or extension, or null.
   */
  exclusionReason(name: string, extension: string): string | null {
    if (this.excludedMatchers.some((matcher) => matcher.test(name))) {
      return 'excluded name';
    }
    const ext = normalizeExtension(extension);
    if (ext && this.excludedExtensions.has(ext)) {
      return `excluded extension ${ext}`;
    }
    return null;
  }

  /**
   * Reason a file is left alone by size, or null. 0 bounds are open.
   */
  sizeExclusionReason(sizeBytes: number): string | null {
    if (this.minFileSize > 0 && sizeBytes < this.minFileSize) {
      return `smaller than ${this.minFileSize} bytes`;
    }
    if (this.maxFileSize > 0 && sizeBytes > this.maxFileSize) {
      return `larger than ${this.maxFileSize} bytes`;
    }
    return null;
  }

  toFileTypes(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [category, extensions] of this.categories) {
      out[category] = [...extensions];
    }
    return out;
  }

  private toInit(): RuleSetInit {
    return {
      rules: this.toFileTypes(),
      defaultCategory: this.defaultCategory,
      organizeByDate: this.organizeByDate,
      dateFormat: this.dateFormat,
      excludedExtensions: [...this.excludedExtensions],
      excludedPatterns: this.excludedPatterns,
      minFileSize: this.minFileSize,
      maxFileSize: this.maxFileSize,
    };
  }
}

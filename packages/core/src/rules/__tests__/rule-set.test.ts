import { describe, expect, it } from 'vitest';
import { RuleSet, isHiddenName, normalizeExtension } from '../rule-set';

describe('normalizeExtension', () => {
  it('lower-cases and gives exactly one leading dot', () => {
    expect(normalizeExtension('PDF')).toBe('.pdf');
    expect(normalizeExtension('.Jpg')).toBe('.jpg');
    expect(normalizeExtension('..tar')).toBe('.tar');
    expect(normalizeExtension('  .md ')).toBe('.md');
  });

  it('turns blank input into an empty string', () => {
    expect(normalizeExtension('')).toBe('');
    expect(normalizeExtension('.')).toBe('');
  });
});

describe('isHiddenName', () => {
  it('flags dot and tilde prefixes only', () => {
    expect(isHiddenName('.env')).toBe(true);
    expect(isHiddenName('~$report.docx')).toBe(true);
    expect(isHiddenName('report.docx')).toBe(false);
  });
});

describe('RuleSet', () => {
  const rules = new RuleSet({
    rules: { Images: ['JPG', '.png'], Docs: ['pdf', '.txt'], Notes: ['.txt', '.md'] },
    defaultCategory: 'Other',
  });

  it('classifies extensions regardless of case and leading dot', () => {
    expect(rules.categoryFor('.JPG')).toBe('Images');
    expect(rules.categoryFor('pdf')).toBe('Docs');
    expect(rules.categoryFor('.md')).toBe('Notes');
  });

  it('falls back to the default category', () => {
    expect(rules.categoryFor('.xyz')).toBe('Other');
    expect(rules.categoryFor('')).toBe('Other');
  });

  it('gives a shared extension to the first category', () => {
    expect(rules.categoryFor('.txt')).toBe('Docs');
  });

  it('stores normalized extensions per category', () => {
    expect(rules.categoryNames()).toEqual(['Images', 'Docs', 'Notes']);
    expect(rules.extensionsFor('Images')).toEqual(['.jpg', '.png']);
    expect(rules.extensionsFor('Missing')).toEqual([]);
  });

  it('returns new rule sets from withRule and withoutRule', () => {
    const extended = rules.withRule('Images', ['.webp']);
    const reduced = rules.withoutRule('Docs');

    expect(extended.categoryFor('.webp')).toBe('Images');
    expect(extended.categoryFor('.jpg')).toBe('Other');
    expect(extended.categoryNames()).toEqual(['Images', 'Docs', 'Notes']);
    expect(reduced.categoryFor('.txt')).toBe('Notes');
    expect(reduced.categoryFor('.pdf')).toBe('Other');
    expect(rules.categoryFor('.jpg')).toBe('Images');
    expect(rules.categoryFor('.webp')).toBe('Other');
  });

  it('reports excluded names and extensions', () => {
    const filtered = new RuleSet({
      rules: {},
      defaultCategory: 'Other',
      excludedExtensions: ['TMP', '.part'],
      excludedPatterns: ['Thumbs.db', 'backup-*.zip'],
    });

    expect(filtered.exclusionReason('thumbs.DB', '.db')).toBe('excluded name');
    expect(filtered.exclusionReason('backup-2024.zip', '.zip')).toBe('excluded name');
    expect(filtered.exclusionReason('my-backup-2024.zip', '.zip')).toBeNull();
    expect(filtered.exclusionReason('movie.PART', '.PART')).toBe('excluded extension .part');
    expect(filtered.exclusionReason('notes.tmp', '.tmp')).toBe('excluded extension .tmp');
    expect(filtered.exclusionReason('notes.txt', '.txt')).toBeNull();
  });

  it('treats zero size bounds as open', () => {
    const open = new RuleSet({ rules: {}, defaultCategory: 'Other' });
    const bounded = new RuleSet({ rules: {}, defaultCategory: 'Other', minFileSize: 10, maxFileSize: 100 });

    expect(open.sizeExclusionReason(0)).toBeNull();
    expect(bounded.sizeExclusionReason(9)).toBe('smaller than 10 bytes');
    expect(bounded.sizeExclusionReason(10)).toBeNull();
    expect(bounded.sizeExclusionReason(100)).toBeNull();
    expect(bounded.sizeExclusionReason(101)).toBe('larger than 100 bytes');
  });
});

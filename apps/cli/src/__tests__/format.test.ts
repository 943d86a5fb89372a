import { describe, expect, it } from 'vitest';
import { formatResult, formatSize } from '../format';

describe('formatSize', () => {
  it('scales to the largest whole unit', () => {
    expect(formatSize(0)).toBe('0 B');
    expect(formatSize(500)).toBe('500 B');
    expect(formatSize(1024)).toBe('1 KB');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(3 * 1024 * 1024)).toBe('3 MB');
  });
});

describe('formatResult', () => {
  it('shows where a moved file went', () => {
    const line = formatResult({
      source: '/in/a.jpg',
      category: 'Images',
      targetDirectory: '/out/Images',
      targetPath: '/out/Images/a.jpg',
      outcome: 'moved',
    });

    expect(line).toContain('/in/a.jpg -> /out/Images/a.jpg');
  });

  it('shows the reason for skips and failures', () => {
    const skipped = formatResult({
      source: '/in/a.jpg',
      category: 'Images',
      targetDirectory: '/out/Images',
      targetPath: '/out/Images/a.jpg',
      outcome: 'skipped',
      error: { code: 'AlreadyExists', message: 'Identical file already exists: /out/Images/a.jpg' },
    });
    const failed = formatResult({
      source: '/in/b.pdf',
      category: '',
      targetDirectory: '',
      targetPath: '',
      outcome: 'failed',
      error: { code: 'NotFound', message: 'gone' },
    });

    expect(skipped).toContain('(Identical file already exists: /out/Images/a.jpg)');
    expect(failed).toContain('/in/b.pdf: gone');
  });
});

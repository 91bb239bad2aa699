import { describe, expect, it } from 'vitest';
import { readableFileSize } from './format';

describe('readableFileSize', () => {
  it('picks the largest whole unit', () => {
    expect(readableFileSize(0)).toBe('0 B');
    expect(readableFileSize(512)).toBe('512.00 B');
    expect(readableFileSize(1536)).toBe('1.50 KB');
    expect(readableFileSize(5 * 1024 * 1024)).toBe('5.00 MB');
    expect(readableFileSize(3 * 1024 ** 3, 1)).toBe('3.0 GB');
  });

  it('keeps the sign of negative savings', () => {
    expect(readableFileSize(-2048)).toBe('-2.00 KB');
  });
});

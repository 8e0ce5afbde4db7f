import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  isAudioQuality,
  sanitizeFileName,
  validateFileSize,
} from '../lib/validation.js';

describe('validation', () => {
  it('replaces unsafe file name characters', () => {
    expect(sanitizeFileName('a/b:c?.mp3')).toBe('a_b_c_.mp3');
    expect(sanitizeFileName('   ')).toBe('download');
    expect(sanitizeFileName('x'.repeat(250))).toHaveLength(200);
  });

  it('formats byte counts', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(500)).toBe('500.00 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(8 * 1024 * 1024)).toBe('8.00 MB');
  });

  it('enforces the file size limit', () => {
    expect(() => validateFileSize(0, 10)).toThrow('File size must be greater than 0');
    expect(() => validateFileSize(2048, 1024)).toThrow(
      'File size (2.00 KB) exceeds maximum allowed size (1.00 KB)'
    );
    expect(() => validateFileSize(1024, 1024)).not.toThrow();
  });

  it('recognises audio qualities', () => {
    expect(isAudioQuality('good')).toBe(true);
    expect(isAudioQuality('great')).toBe(false);
  });
});

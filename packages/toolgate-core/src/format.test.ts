import { describe, it, expect } from 'vitest';

import { clip, formatBytes, groupDigits } from './format.js';

describe('groupDigits', () => {
  it('inserts thousands separators', () => {
    expect(groupDigits(1_048_576)).toBe('1,048,576');
    expect(groupDigits(999)).toBe('999');
    expect(groupDigits(1000)).toBe('1,000');
  });
});

describe('formatBytes', () => {
  it('formats megabytes', () => {
    expect(formatBytes(1_048_576)).toBe('1,048,576 bytes (1.0 MB)');
    expect(formatBytes(1_048_577)).toBe('1,048,577 bytes (1.0 MB)');
  });

  it('formats kilobytes', () => {
    expect(formatBytes(2048)).toBe('2,048 bytes (2.0 KB)');
  });

  it('leaves small sizes as bytes', () => {
    expect(formatBytes(12)).toBe('12 bytes');
  });
});

describe('clip', () => {
  it('keeps the first 200 characters by default', () => {
    expect(clip('x'.repeat(250))).toHaveLength(200);
    expect(clip('short')).toBe('short');
  });

  it('accepts a custom limit', () => {
    expect(clip('abcdef', 3)).toBe('abc');
  });
});

import { describe, it, expect } from 'vitest';
import { maskAccountNumber } from '@stmtlens/types';

describe('maskAccountNumber', () => {
  it('should keep only the last four digits', () => {
    expect(maskAccountNumber('123456789272')).toBe('********9272');
  });

  it('should drop separators before masking', () => {
    expect(maskAccountNumber('1234-5678 9272')).toBe('********9272');
  });

  it('should return short numbers unchanged', () => {
    expect(maskAccountNumber('9272')).toBe('9272');
    expect(maskAccountNumber('A-72')).toBe('72');
  });

  it('should return null for missing values', () => {
    expect(maskAccountNumber(null)).toBeNull();
    expect(maskAccountNumber(undefined)).toBeNull();
    expect(maskAccountNumber('')).toBeNull();
  });
});

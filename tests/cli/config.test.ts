import { describe, it, expect } from 'vitest';
import { envBool, parseRetries, requireApiKey } from '../../apps/cli/src/config.js';

describe('envBool', () => {
  it('should fall back to the default when unset or empty', () => {
    expect(envBool('STATEMENT_PRETTY', true, {})).toBe(true);
    expect(envBool('STATEMENT_PRETTY', false, { STATEMENT_PRETTY: '' })).toBe(false);
  });

  it('should accept true and 1', () => {
    expect(envBool('STATEMENT_TEST', false, { STATEMENT_TEST: 'true' })).toBe(true);
    expect(envBool('STATEMENT_TEST', false, { STATEMENT_TEST: '1' })).toBe(true);
  });

  it('should treat anything else as false', () => {
    expect(envBool('STATEMENT_TEST', true, { STATEMENT_TEST: 'yes' })).toBe(false);
  });
});

describe('parseRetries', () => {
  it('should parse non-negative integers', () => {
    expect(parseRetries('0')).toBe(0);
    expect(parseRetries('3')).toBe(3);
  });

  it('should reject other values', () => {
    expect(() => parseRetries('-1')).toThrow('--retries must be a non-negative integer, got "-1"');
    expect(() => parseRetries('1.5')).toThrow('--retries must be a non-negative integer');
    expect(() => parseRetries('many')).toThrow('--retries must be a non-negative integer');
  });
});

describe('requireApiKey', () => {
  it('should return the configured key', () => {
    expect(requireApiKey({ GEMINI_API_KEY: 'test-secret' })).toBe('test-secret');
  });

  it('should throw when the key is missing', () => {
    expect(() => requireApiKey({})).toThrow('GEMINI_API_KEY env var is required');
    expect(() => requireApiKey({ GEMINI_API_KEY: '' })).toThrow('GEMINI_API_KEY env var is required');
  });
});

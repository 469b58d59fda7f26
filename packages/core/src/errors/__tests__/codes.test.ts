import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES)).toHaveLength(enumCodes.length);
    for (const code of enumCodes) {
      expect(getExitCode(code)).toBe(1);
    }
  });

  test('codes follow the E### format', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(code).toMatch(/^E\d{3}$/);
    }
  });
});

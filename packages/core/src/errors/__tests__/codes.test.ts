import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  EXIT_CODES,
  HTTP_STATUS_BY_CODE,
  getExitCode,
  getHttpStatus,
} from '../codes.js';

describe('error codes', () => {
  it('maps every code to an exit code and HTTP status', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
      expect(HTTP_STATUS_BY_CODE[code]).toBeTypeOf('number');
    }
  });

  it('keeps exit codes unique', () => {
    const values = Object.values(EXIT_CODES);
    expect(new Set(values).size).toBe(values.length);
  });

  it('reports non-feasible requests as unprocessable', () => {
    expect(ErrorCode.NON_FEASIBLE_CONFIG).toBe('E100');
    expect(getExitCode(ErrorCode.NON_FEASIBLE_CONFIG)).toBe(30);
    expect(getHttpStatus(ErrorCode.NON_FEASIBLE_CONFIG)).toBe(422);
    expect(getHttpStatus(ErrorCode.INVALID_ARGUMENT)).toBe(400);
  });
});

/**
 * Severity Tests
 */

import { describe, it, expect } from 'vitest';
import {
  SEVERITIES,
  EXIT_CODES,
  toExitCode,
  fromExitCode,
  isSeverity,
  worstSeverity,
} from '../src/lib/severity/index.js';

describe('exit codes', () => {
  it('should map severities to the standard plugin exit codes', () => {
    expect(EXIT_CODES).toEqual({ OK: 0, WARNING: 1, CRITICAL: 2, UNKNOWN: 3 });
    expect(SEVERITIES.map(toExitCode)).toEqual([0, 1, 2, 3]);
  });

  it('should map exit codes back to severities', () => {
    expect([0, 1, 2, 3].map(fromExitCode)).toEqual(['OK', 'WARNING', 'CRITICAL', 'UNKNOWN']);
  });

  it('should reject codes outside 0-3', () => {
    expect(() => fromExitCode(4)).toThrow(RangeError);
    expect(() => fromExitCode(-1)).toThrow(RangeError);
    expect(() => fromExitCode(1.5)).toThrow('No severity for exit code 1.5');
  });
});

describe('isSeverity', () => {
  it('should only accept the four states', () => {
    expect(isSeverity('WARNING')).toBe(true);
    expect(isSeverity('warning')).toBe(false);
    expect(isSeverity(1)).toBe(false);
  });
});

describe('worstSeverity', () => {
  it('should be UNKNOWN for an empty set', () => {
    expect(worstSeverity([])).toBe('UNKNOWN');
  });

  it('should never let UNKNOWN mask CRITICAL or WARNING', () => {
    expect(worstSeverity(['UNKNOWN', 'CRITICAL'])).toBe('CRITICAL');
    expect(worstSeverity(['UNKNOWN', 'WARNING', 'OK'])).toBe('WARNING');
  });

  it('should let UNKNOWN win over OK', () => {
    expect(worstSeverity(['OK', 'UNKNOWN', 'OK'])).toBe('UNKNOWN');
  });

  it('should pick the worst of OK, WARNING and CRITICAL', () => {
    expect(worstSeverity(['OK', 'WARNING', 'CRITICAL'])).toBe('CRITICAL');
    expect(worstSeverity(['OK', 'WARNING'])).toBe('WARNING');
    expect(worstSeverity(['OK'])).toBe('OK');
  });
});

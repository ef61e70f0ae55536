/**
 * Severity
 *
 * The four plugin states and their fixed process exit codes.
 */

import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

export const SEVERITIES = ['OK', 'WARNING', 'CRITICAL', 'UNKNOWN'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const SeveritySchema = z.enum(SEVERITIES);

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES: Readonly<Record<Severity, number>> = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3,
};

export function toExitCode(severity: Severity): number {
  return EXIT_CODES[severity];
}

export function fromExitCode(code: number): Severity {
  const severity: Severity | undefined = SEVERITIES[code];
  if (!Number.isInteger(code) || severity === undefined) {
    throw new RangeError(`No severity for exit code ${code}`);
  }
  return severity;
}

export function isSeverity(value: unknown): value is Severity {
  return SeveritySchema.safeParse(value).success;
}

// ============================================================================
// Worst-case
// ============================================================================

/**
 * Overall severity of a set of outcomes.
 *
 * CRITICAL is never masked by UNKNOWN, and UNKNOWN only wins over OK.
 * An empty set is UNKNOWN: nothing produced a verdict.
 */
export function worstSeverity(severities: Iterable<Severity>): Severity {
  const seen = new Set(severities);

  if (seen.has('CRITICAL')) return 'CRITICAL';
  if (seen.has('WARNING')) return 'WARNING';
  if (seen.has('UNKNOWN')) return 'UNKNOWN';
  if (seen.has('OK')) return 'OK';
  return 'UNKNOWN';
}

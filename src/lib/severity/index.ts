/**
 * Severity Module
 *
 * Provides:
 * - The OK / WARNING / CRITICAL / UNKNOWN states
 * - Exit code mapping (0-3)
 * - Worst-case aggregation
 */

export {
  SEVERITIES,
  SeveritySchema,
  EXIT_CODES,
  toExitCode,
  fromExitCode,
  isSeverity,
  worstSeverity,
  type Severity,
} from './severity.js';

/**
 * Threshold Checker
 *
 * Classifies a measurement against optional warning and critical ranges.
 * Critical is checked before warning.
 */

import type { Severity } from '../severity/index.js';
import {
  thresholdContains,
  toThresholdRange,
  type ThresholdInput,
  type ThresholdRange,
} from './range.js';

// ============================================================================
// Evaluation
// ============================================================================

export function evaluateThresholds(
  value: number,
  warning?: ThresholdInput,
  critical?: ThresholdInput
): Severity {
  // both are parsed before either is evaluated
  const warn = warning === undefined ? undefined : toThresholdRange(warning);
  const crit = critical === undefined ? undefined : toThresholdRange(critical);

  if (crit && thresholdContains(crit, value)) {
    return 'CRITICAL';
  }
  if (warn && thresholdContains(warn, value)) {
    return 'WARNING';
  }
  return 'OK';
}

// ============================================================================
// Threshold Checker
// ============================================================================

export interface ThresholdPair {
  warning?: ThresholdInput;
  critical?: ThresholdInput;
}

export class ThresholdChecker {
  readonly warning?: ThresholdRange;
  readonly critical?: ThresholdRange;

  constructor(thresholds: ThresholdPair = {}) {
    if (thresholds.warning !== undefined) {
      this.warning = toThresholdRange(thresholds.warning);
    }
    if (thresholds.critical !== undefined) {
      this.critical = toThresholdRange(thresholds.critical);
    }
  }

  /**
   * Check a single value against the configured ranges
   */
  check(value: number): Severity {
    return evaluateThresholds(value, this.warning, this.critical);
  }

  /**
   * Check several values, returning one severity per value in order
   */
  checkMany(values: readonly number[]): Severity[] {
    return values.map(value => this.check(value));
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createThresholdChecker(thresholds?: ThresholdPair): ThresholdChecker {
  return new ThresholdChecker(thresholds);
}

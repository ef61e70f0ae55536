/**
 * Thresholds Module
 *
 * Provides:
 * - Range expression parsing ([@][start:][end])
 * - Alarm evaluation with inversion
 * - Canonical range formatting
 * - Warning/critical classification
 */

export {
  parseThreshold,
  thresholdContains,
  formatThreshold,
  formatNumber,
  toThresholdRange,
  type ThresholdRange,
  type ThresholdInput,
} from './range.js';

export {
  ThresholdChecker,
  createThresholdChecker,
  evaluateThresholds,
  type ThresholdPair,
} from './checker.js';

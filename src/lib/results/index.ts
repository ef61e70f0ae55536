/**
 * Results Module
 *
 * Provides:
 * - Ordered (severity, message) collection
 * - Worst-case overall code
 * - Combined message selection
 */

export {
  ResultAggregator,
  createResultAggregator,
  type CheckResult,
  type MessageOptions,
} from './aggregator.js';

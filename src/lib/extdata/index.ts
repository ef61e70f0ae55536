/**
 * Extended Data Module
 */

export {
  ExtendedDataCollector,
  createExtendedDataCollector,
  type LineSink,
} from './collector.js';

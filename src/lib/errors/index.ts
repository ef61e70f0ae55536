/**
 * Errors Module
 */

export {
  PluginError,
  InvalidThresholdFormatError,
  InvalidPerfdataLabelError,
  InvalidPerfdataValueError,
  InvalidPerfdataUnitError,
} from './errors.js';

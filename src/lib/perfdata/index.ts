/**
 * Perfdata Module
 *
 * Provides:
 * - Label validation and quoting
 * - Single-line perfdata rendering
 */

export {
  PerfdataFormatter,
  createPerfdataFormatter,
  formatPerfdatum,
  quoteLabel,
  type Perfdatum,
  type PerfdataOptions,
} from './formatter.js';

/**
 * Performance Data Formatter
 *
 * Renders metrics in the plugin perfdata wire format:
 *
 *   'label'=value[uom];[warn];[crit];[min];[max]
 *
 * Tokens are space-separated in insertion order. Empty positions are kept.
 */

import {
  InvalidPerfdataLabelError,
  InvalidPerfdataUnitError,
  InvalidPerfdataValueError,
} from '../errors/index.js';
import {
  formatNumber,
  formatThreshold,
  parseThreshold,
  type ThresholdInput,
} from '../thresholds/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PerfdataOptions {
  /** Unit of measurement (s, %, B, KB, c, ...) */
  uom?: string;
  warning?: ThresholdInput;
  critical?: ThresholdInput;
  min?: number;
  max?: number;
}

export interface Perfdatum {
  readonly label: string;
  readonly value: number;
  readonly uom?: string;
  /** Threshold text as it will appear on the wire */
  readonly warning?: string;
  readonly critical?: string;
  readonly min?: number;
  readonly max?: number;
}

// ============================================================================
// Validation
// ============================================================================

function validateLabel(label: string): void {
  if (label === '') {
    throw new InvalidPerfdataLabelError(label, 'label is empty');
  }
  if (label.includes('=')) {
    throw new InvalidPerfdataLabelError(label, 'label contains "="');
  }
  if (/[\r\n]/.test(label)) {
    throw new InvalidPerfdataLabelError(label, 'label contains a line break');
  }
}

// digits, signs and the decimal point would merge into the value
const UNIT_FORBIDDEN = /[\d\s;'"=|.+-]/;

function validateUnit(uom: string | undefined): void {
  if (uom !== undefined && UNIT_FORBIDDEN.test(uom)) {
    throw new InvalidPerfdataUnitError(uom);
  }
}

function validateNumber(field: string, value: number | undefined): void {
  if (value !== undefined && !Number.isFinite(value)) {
    throw new InvalidPerfdataValueError(field, value);
  }
}

function thresholdText(input: ThresholdInput | undefined): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input === 'string') {
    parseThreshold(input);
    return input;
  }
  return formatThreshold(input);
}

// ============================================================================
// Formatting
// ============================================================================

export function quoteLabel(label: string): string {
  return `'${label.replace(/'/g, "''")}'`;
}

export function formatPerfdatum(datum: Perfdatum): string {
  const fields = [
    `${formatNumber(datum.value)}${datum.uom ?? ''}`,
    datum.warning ?? '',
    datum.critical ?? '',
    datum.min === undefined ? '' : formatNumber(datum.min),
    datum.max === undefined ? '' : formatNumber(datum.max),
  ];
  return `${quoteLabel(datum.label)}=${fields.join(';')}`;
}

// ============================================================================
// Perfdata Formatter
// ============================================================================

export class PerfdataFormatter {
  private entries: Perfdatum[] = [];

  add(label: string, value: number, options: PerfdataOptions = {}): Perfdatum {
    validateLabel(label);
    validateUnit(options.uom);
    validateNumber('value', value);
    validateNumber('min', options.min);
    validateNumber('max', options.max);

    const datum: Perfdatum = Object.freeze({
      label,
      value,
      uom: options.uom,
      warning: thresholdText(options.warning),
      critical: thresholdText(options.critical),
      min: options.min,
      max: options.max,
    });

    this.entries.push(datum);
    return datum;
  }

  render(): string {
    return this.entries.map(formatPerfdatum).join(' ');
  }

  get items(): readonly Perfdatum[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createPerfdataFormatter(): PerfdataFormatter {
  return new PerfdataFormatter();
}

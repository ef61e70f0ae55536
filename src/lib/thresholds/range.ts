/**
 * Threshold Ranges
 *
 * Parses and evaluates the monitoring-plugins range syntax:
 *
 *   10       alarm if < 0 or > 10
 *   10:      alarm if < 10
 *   ~:10     alarm if > 10 (same as :10)
 *   10:20    alarm if < 10 or > 20
 *   @10:20   alarm if >= 10 and <= 20
 *
 * See https://www.monitoring-plugins.org/doc/guidelines.html#THRESHOLDFORMAT
 */

import { InvalidThresholdFormatError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ThresholdRange {
  /** Inclusive lower bound, -Infinity when unbounded */
  readonly start: number;
  /** Inclusive upper bound, +Infinity when unbounded */
  readonly end: number;
  /** Alarm inside the range instead of outside it */
  readonly inverted: boolean;
}

export type ThresholdInput = string | ThresholdRange;

// ============================================================================
// Parsing
// ============================================================================

const NUMBER = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)`;

const RANGE_PATTERN = new RegExp(
  `^(@)?(?:(~|${NUMBER})?(:))?(${NUMBER})?$`
);

export function parseThreshold(expression: string): ThresholdRange {
  const text = expression.trim();
  if (text === '') {
    throw new InvalidThresholdFormatError(expression, 'empty expression');
  }

  const match = RANGE_PATTERN.exec(text);
  if (!match) {
    throw new InvalidThresholdFormatError(expression, 'does not match [@][start:][end]');
  }

  const [, at, startText, colon, endText]: Array<string | undefined> = match;

  if (colon === undefined && endText === undefined) {
    throw new InvalidThresholdFormatError(expression, 'missing range');
  }
  if (colon !== undefined && startText === undefined && endText === undefined) {
    throw new InvalidThresholdFormatError(expression, 'missing start and end');
  }

  // bare "<end>" starts at zero, "~:" and ":" start at -Infinity
  let start: number;
  if (colon === undefined) {
    start = 0;
  } else if (startText === undefined || startText === '~') {
    start = -Infinity;
  } else {
    start = Number(startText);
  }

  const end = endText === undefined ? Infinity : Number(endText);

  if (start > end) {
    throw new InvalidThresholdFormatError(expression, `start ${start} is greater than end ${end}`);
  }

  return Object.freeze({ start, end, inverted: at === '@' });
}

export function toThresholdRange(input: ThresholdInput): ThresholdRange {
  return typeof input === 'string' ? parseThreshold(input) : input;
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * True when the value raises an alarm for this range
 */
export function thresholdContains(range: ThresholdRange, value: number): boolean {
  if (Number.isNaN(value)) {
    return true;
  }

  const inside = value >= range.start && value <= range.end;
  return range.inverted ? inside : !inside;
}

// ============================================================================
// Formatting
// ============================================================================

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Plain decimal text for a finite number, never exponent notation
 */
export function formatNumber(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, lead, fraction, exponent]: Array<string | undefined> = match;
  const digits = `${lead ?? ''}${fraction ?? ''}`;
  const point = 1 + Number(exponent);

  if (point <= 0) {
    return `${sign ?? ''}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign ?? ''}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign ?? ''}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function formatThreshold(range: ThresholdRange): string {
  const prefix = range.inverted ? '@' : '';
  const start = range.start === -Infinity ? '~' : formatNumber(range.start);
  const end = range.end === Infinity ? '' : formatNumber(range.end);
  return `${prefix}${start}:${end}`;
}

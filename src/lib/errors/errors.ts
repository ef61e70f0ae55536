/**
 * Plugin Errors
 *
 * Raised synchronously by the call that received the bad input.
 * A failed call never changes the state of the object it was made on.
 */

export class PluginError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PluginError';
  }
}

/** Malformed threshold range expression, or start greater than end */
export class InvalidThresholdFormatError extends PluginError {
  readonly expression: string;

  constructor(expression: string, reason: string) {
    super(`Invalid threshold "${expression}": ${reason}`);
    this.name = 'InvalidThresholdFormatError';
    this.expression = expression;
  }
}

export class InvalidPerfdataLabelError extends PluginError {
  readonly label: string;

  constructor(label: string, reason: string) {
    super(`Invalid perfdata label "${label}": ${reason}`);
    this.name = 'InvalidPerfdataLabelError';
    this.label = label;
  }
}

export class InvalidPerfdataValueError extends PluginError {
  readonly value: number;

  constructor(field: string, value: number) {
    super(`Invalid perfdata ${field}: ${value} is not a finite number`);
    this.name = 'InvalidPerfdataValueError';
    this.value = value;
  }
}

export class InvalidPerfdataUnitError extends PluginError {
  readonly uom: string;

  constructor(uom: string) {
    super(`Invalid perfdata unit "${uom}": units cannot contain digits, signs, '.', whitespace or ; ' " = |`);
    this.name = 'InvalidPerfdataUnitError';
    this.uom = uom;
  }
}

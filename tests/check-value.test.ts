/**
 * check-value CLI Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { runCheckValue } from '../src/cli/check-value.js';

const run = (args: string[]) => {
  const io = { write: vi.fn<(text: string) => void>(), exit: vi.fn<(code: number) => void>() };
  runCheckValue(args, { io, catchExceptions: false });
  return io;
};

describe('check-value', () => {
  it('should classify the value and print perfdata', () => {
    const io = run(['--value', '93', '-w', ':90', '-c', ':95']);

    expect(io.write).toHaveBeenCalledWith("CHECK_VALUE WARNING - value=93 | 'value'=93;:90;:95;0;100\n");
    expect(io.exit).toHaveBeenCalledWith(1);
  });

  it('should accept negative threshold values', () => {
    const io = run(['--value', '-3', '-w', '-10:20']);

    expect(io.write).toHaveBeenCalledWith("CHECK_VALUE OK - value=-3 | 'value'=-3;-10:20;;0;100\n");
    expect(io.exit).toHaveBeenCalledWith(0);
  });

  it('should not take the next flag as an option value', () => {
    const io = run(['--value', '5', '-w', '-c', '5']);

    expect(io.write).toHaveBeenCalledWith('CHECK_VALUE UNKNOWN - -w requires a value\n');
    expect(io.exit).toHaveBeenCalledWith(3);
  });

  it('should reject a trailing flag with no value', () => {
    const io = run(['--value', '5', '-c']);

    expect(io.write).toHaveBeenCalledWith('CHECK_VALUE UNKNOWN - -c requires a value\n');
    expect(io.exit).toHaveBeenCalledWith(3);
  });

  it.each(['abc', '0', '-2', '1.5'])('should reject timeout %j', (timeout) => {
    const io = run(['--value', '5', '-t', timeout]);

    expect(io.write).toHaveBeenCalledWith('CHECK_VALUE UNKNOWN - -t must be a positive number of seconds\n');
    expect(io.exit).toHaveBeenCalledTimes(1);
    expect(io.exit).toHaveBeenCalledWith(3);
  });

  it('should require a numeric value', () => {
    const io = run(['--value', 'lots']);

    expect(io.write).toHaveBeenCalledWith('CHECK_VALUE UNKNOWN - --value must be a number\n');
    expect(io.exit).toHaveBeenCalledWith(3);
  });

  it('should report a malformed threshold as UNKNOWN', () => {
    const io = run(['--value', '5', '-w', 'abc']);

    expect(io.write).toHaveBeenCalledWith(
      'CHECK_VALUE UNKNOWN - Invalid threshold "abc": does not match [@][start:][end]\n'
    );
    expect(io.exit).toHaveBeenCalledWith(3);
  });
});

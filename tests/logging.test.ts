/**
 * Extended Data Logger Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createExtdataLogger,
  createSinkDestination,
  verbosityToLevel,
} from '../src/lib/logging/index.js';
import { createExtendedDataCollector } from '../src/lib/extdata/index.js';

describe('createExtdataLogger', () => {
  it('should forward one line per record', () => {
    const collector = createExtendedDataCollector();
    const log = createExtdataLogger(collector);

    log.info('first');
    log.warn('second');

    expect(collector.lines).toEqual(['first', 'second']);
  });

  it('should drop records below the level', () => {
    const collector = createExtendedDataCollector();
    const log = createExtdataLogger(collector, { level: 'warn' });

    log.info('hidden');
    log.error('shown');

    expect(collector.render()).toBe('shown');
  });

  it('should use a custom format', () => {
    const collector = createExtendedDataCollector();
    const log = createExtdataLogger(collector, {
      level: 'debug',
      format: (record) => `${record.level.toUpperCase()}: ${record.msg ?? ''}`,
    });

    log.debug('probing sda');
    log.warn('disk slow');

    expect(collector.lines).toEqual(['DEBUG: probing sda', 'WARN: disk slow']);
  });

  it('should pass merged fields to the format', () => {
    const collector = createExtendedDataCollector();
    const log = createExtdataLogger(collector, {
      format: (record) => `${String(record.disk)} ${record.msg ?? ''}`,
    });

    log.child({ disk: 'sda' }).info('ok');

    expect(collector.lines).toEqual(['sda ok']);
  });

  it('should keep a multi-line message as one line entry', () => {
    const collector = createExtendedDataCollector();
    createExtdataLogger(collector).info('a\nb');

    expect(collector.size).toBe(1);
    expect(collector.render()).toBe('a\nb');
  });
});

describe('createSinkDestination', () => {
  it('should forward raw text that is not a record', () => {
    const collector = createExtendedDataCollector();
    const destination = createSinkDestination(collector);

    destination.write('not json\n');
    destination.write('{"foo":1}\n');

    expect(collector.lines).toEqual(['not json', '{"foo":1}']);
  });
});

describe('verbosityToLevel', () => {
  it('should map the -v count to a level', () => {
    expect([0, 1, 2, 3, 7].map(verbosityToLevel)).toEqual(['warn', 'info', 'debug', 'trace', 'trace']);
  });
});

/**
 * Extended Data Collector Tests
 */

import { describe, it, expect } from 'vitest';
import { createExtendedDataCollector, type LineSink } from '../src/lib/extdata/index.js';

describe('ExtendedDataCollector', () => {
  it('should join lines with line breaks', () => {
    const collector = createExtendedDataCollector();
    collector.add('x');
    collector.add('y');

    expect(collector.render()).toBe('x\ny');
  });

  it('should be empty when nothing was added', () => {
    expect(createExtendedDataCollector().render()).toBe('');
  });

  it('should keep duplicates and empty lines', () => {
    const collector = createExtendedDataCollector();
    collector.add('OK');
    collector.add('');
    collector.add('OK');

    expect(collector.render()).toBe('OK\n\nOK');
    expect(collector.lines).toEqual(['OK', '', 'OK']);
    expect(collector.size).toBe(3);
  });

  it('should render the same output twice', () => {
    const collector = createExtendedDataCollector();
    collector.add('hey!');

    expect(collector.render()).toBe(collector.render());
  });

  it('should work as a line sink', () => {
    const collector = createExtendedDataCollector();
    const sink: LineSink = collector;
    ['OK', 'hey!', 'STUFF'].forEach(line => sink.add(line));

    expect(collector.render()).toBe('OK\nhey!\nSTUFF');
  });
});

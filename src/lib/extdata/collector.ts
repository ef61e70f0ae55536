/**
 * Extended Data Collector
 *
 * Free-text lines printed after the summary line.
 */

/**
 * Anything that accepts one formatted line at a time
 */
export interface LineSink {
  add(line: string): void;
}

export class ExtendedDataCollector implements LineSink {
  private entries: string[] = [];

  add(line: string): void {
    this.entries.push(line);
  }

  render(): string {
    return this.entries.join('\n');
  }

  get lines(): readonly string[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

export function createExtendedDataCollector(): ExtendedDataCollector {
  return new ExtendedDataCollector();
}

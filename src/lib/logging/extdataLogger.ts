/**
 * Extended Data Logger
 *
 * A pino logger whose destination forwards each record, formatted as
 * one line, to a LineSink such as the extended data collector.
 */

import pino, { type DestinationStream, type Level, type Logger } from 'pino';
import { z } from 'zod';
import type { LineSink } from '../extdata/index.js';

// ============================================================================
// Types
// ============================================================================

const LogRecordSchema = z
  .object({
    level: z.string(),
    msg: z.string().optional(),
  })
  .passthrough();

export type LogRecord = z.infer<typeof LogRecordSchema>;

export interface ExtdataLoggerOptions {
  /** Minimum level forwarded to the sink (default: info) */
  level?: Level;
  /** Turn a record into its output line (default: the message) */
  format?: (record: LogRecord) => string;
}

const defaultFormat = (record: LogRecord): string => record.msg ?? '';

// ============================================================================
// Destination
// ============================================================================

export function createSinkDestination(
  sink: LineSink,
  format: (record: LogRecord) => string = defaultFormat
): DestinationStream {
  return {
    write(chunk: string): void {
      const raw = chunk.replace(/\r?\n$/, '');

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        sink.add(raw);
        return;
      }

      const record = LogRecordSchema.safeParse(parsed);
      sink.add(record.success ? format(record.data) : raw);
    },
  };
}

// ============================================================================
// Factory
// ============================================================================

export function createExtdataLogger(
  sink: LineSink,
  options: ExtdataLoggerOptions = {}
): Logger {
  return pino(
    {
      level: options.level ?? 'info',
      base: null,
      timestamp: false,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    createSinkDestination(sink, options.format)
  );
}

/**
 * Map the plugin -v count to a log level
 */
export function verbosityToLevel(verbose: number): Level {
  if (verbose <= 0) return 'warn';
  if (verbose === 1) return 'info';
  if (verbose === 2) return 'debug';
  return 'trace';
}

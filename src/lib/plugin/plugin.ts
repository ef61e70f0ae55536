/**
 * Plugin
 *
 * Ties the result aggregator, perfdata formatter and extended data
 * collector to process output and exit status, with an optional
 * timeout and uncaught exception handling.
 */

import { basename, extname } from 'path';
import type { Logger } from 'pino';
import type { PluginConfig } from '../config/index.js';
import { PluginError } from '../errors/index.js';
import { ExtendedDataCollector } from '../extdata/index.js';
import { createExtdataLogger, type ExtdataLoggerOptions } from '../logging/index.js';
import { formatSummary, renderOutput } from '../output/index.js';
import { PerfdataFormatter, type PerfdataOptions, type Perfdatum } from '../perfdata/index.js';
import { ResultAggregator, type CheckResult } from '../results/index.js';
import { toExitCode, type Severity } from '../severity/index.js';
import { evaluateThresholds, type ThresholdInput } from '../thresholds/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PluginIO {
  write(text: string): void;
  exit(code: number): void;
}

export interface PluginOptions {
  /** Name shown at the start of the summary line (default: script name) */
  name?: string;
  version?: string;
  /** Default timeout in seconds for setTimeout() */
  timeout?: number;
  /** Default severity reported on timeout */
  timeoutStatus?: Severity;
  /** Report uncaught exceptions as UNKNOWN (default: true) */
  catchExceptions?: boolean;
  io?: PluginIO;
}

export interface ExitOptions {
  code?: Severity;
  message?: string;
  perfdata?: string;
  extdata?: string;
}

const processIO: PluginIO = {
  write: (text) => {
    process.stdout.write(text);
  },
  exit: (code) => {
    process.exit(code);
  },
};

function scriptName(): string {
  const script = process.argv[1] ?? 'plugin';
  return basename(script, extname(script));
}

// ============================================================================
// Plugin
// ============================================================================

export class Plugin {
  readonly name: string;
  readonly version: string;

  private readonly io: PluginIO;
  private readonly defaultTimeout: number;
  private readonly defaultTimeoutStatus: Severity;
  private readonly aggregator = new ResultAggregator();
  private readonly perfdataFormatter = new PerfdataFormatter();
  private readonly extdataCollector = new ExtendedDataCollector();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private catching = false;

  constructor(options: PluginOptions = {}) {
    this.name = options.name ?? scriptName();
    this.version = options.version ?? 'undefined';
    this.io = options.io ?? processIO;
    this.defaultTimeout = options.timeout ?? 10;
    this.defaultTimeoutStatus = options.timeoutStatus ?? 'UNKNOWN';

    if (options.catchExceptions ?? true) {
      process.on('uncaughtException', this.handleUncaught);
      this.catching = true;
    }
  }

  static fromConfig(config: PluginConfig, options: PluginOptions = {}): Plugin {
    return new Plugin({
      name: config.name,
      version: config.version,
      timeout: config.timeout,
      timeoutStatus: config.timeout_status,
      ...options,
    });
  }

  // --------------------------------------------------------------------------
  // Recording
  // --------------------------------------------------------------------------

  addResult(severity: Severity, message?: string): CheckResult {
    return this.aggregator.addResult(severity, message);
  }

  addPerfdata(label: string, value: number, options?: PerfdataOptions): Perfdatum {
    return this.perfdataFormatter.add(label, value, options);
  }

  addExtdata(line: string): void {
    this.extdataCollector.add(line);
  }

  checkThreshold(value: number, warning?: ThresholdInput, critical?: ThresholdInput): Severity {
    return evaluateThresholds(value, warning, critical);
  }

  /**
   * Record a configuration mistake (any PluginError) as an UNKNOWN result
   */
  reportError(error: unknown): CheckResult {
    if (error instanceof PluginError) {
      return this.aggregator.addResult('UNKNOWN', error.message);
    }
    throw error;
  }

  extdataLogger(options?: ExtdataLoggerOptions): Logger {
    return createExtdataLogger(this.extdataCollector, options);
  }

  // --------------------------------------------------------------------------
  // Reading
  // --------------------------------------------------------------------------

  code(): Severity {
    return this.aggregator.code();
  }

  message(): string {
    return this.aggregator.message();
  }

  perfdata(): string {
    return this.perfdataFormatter.render();
  }

  extdata(): string {
    return this.extdataCollector.render();
  }

  get results(): readonly CheckResult[] {
    return this.aggregator.results;
  }

  // --------------------------------------------------------------------------
  // Timeout
  // --------------------------------------------------------------------------

  setTimeout(seconds: number = this.defaultTimeout, status: Severity = this.defaultTimeoutStatus): void {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new RangeError(`Timeout must be a positive number of seconds, got ${seconds}`);
    }
    this.clearTimeout();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.exit({ code: status, message: `plugin timed out after ${seconds} seconds` });
    }, seconds * 1000);
    this.timer.unref();
  }

  clearTimeout(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  // --------------------------------------------------------------------------
  // Exit
  // --------------------------------------------------------------------------

  exit(options: ExitOptions = {}): void {
    const code = options.code ?? 'UNKNOWN';
    const output = renderOutput({
      summary: formatSummary(this.name, code, options.message ?? ''),
      perfdata: options.perfdata,
      extdata: options.extdata,
    });

    this.dispose();
    this.io.write(`${output}\n`);
    this.io.exit(toExitCode(code));
  }

  die(message: string): void {
    this.exit({ code: 'UNKNOWN', message });
  }

  /**
   * Exit with the collected results, perfdata and extended data.
   * Any field can be overridden.
   */
  finish(overrides: ExitOptions = {}): void {
    const code = overrides.code ?? this.code();
    this.exit({
      code,
      message: overrides.message ?? this.aggregator.messageFor(code),
      perfdata: overrides.perfdata ?? this.perfdata(),
      extdata: overrides.extdata ?? this.extdata(),
    });
  }

  /**
   * Release the timer and the uncaught exception listener
   */
  dispose(): void {
    this.clearTimeout();
    if (this.catching) {
      process.off('uncaughtException', this.handleUncaught);
      this.catching = false;
    }
  }

  // anything can be thrown, not only Errors
  private handleUncaught = (thrown: unknown): void => {
    if (thrown instanceof Error) {
      this.exit({
        code: 'UNKNOWN',
        message: `Uncaught exception: ${thrown.name} - ${thrown.message}`,
        extdata: thrown.stack ?? '',
      });
      return;
    }
    this.exit({ code: 'UNKNOWN', message: `Uncaught exception: ${String(thrown)}` });
  };
}

// ============================================================================
// Factory
// ============================================================================

export function createPlugin(options?: PluginOptions): Plugin {
  return new Plugin(options);
}

/**
 * Result Aggregator
 *
 * Collects the outcome of each sub-check and reduces them to one
 * overall severity and message.
 */

import { worstSeverity, type Severity } from '../severity/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckResult {
  readonly severity: Severity;
  readonly message: string;
}

export interface MessageOptions {
  /** Severities to include (default: OK, WARNING, CRITICAL) */
  levels?: readonly Severity[];
  /** Separator between messages (default: ', ') */
  joiner?: string;
}

const DEFAULT_MESSAGE_LEVELS: readonly Severity[] = ['OK', 'WARNING', 'CRITICAL'];

// ============================================================================
// Result Aggregator
// ============================================================================

export class ResultAggregator {
  private entries: CheckResult[] = [];

  addResult(severity: Severity, message: string = ''): CheckResult {
    const result = Object.freeze({ severity, message });
    this.entries.push(result);
    return result;
  }

  /**
   * Overall severity, UNKNOWN when nothing was added
   */
  code(): Severity {
    return worstSeverity(this.entries.map(r => r.severity));
  }

  /**
   * Message of the earliest result carrying the overall severity
   */
  message(): string {
    return this.messageFor(this.code());
  }

  /**
   * Message of the earliest result with the given severity
   */
  messageFor(severity: Severity): string {
    return this.entries.find(r => r.severity === severity)?.message ?? '';
  }

  /**
   * Join the non-empty messages of the selected severities
   */
  messages(options: MessageOptions = {}): string {
    const levels = options.levels ?? DEFAULT_MESSAGE_LEVELS;
    const joiner = options.joiner ?? ', ';

    return this.entries
      .filter(r => levels.includes(r.severity) && r.message !== '')
      .map(r => r.message)
      .join(joiner);
  }

  get results(): readonly CheckResult[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createResultAggregator(): ResultAggregator {
  return new ResultAggregator();
}

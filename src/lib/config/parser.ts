/**
 * Configuration Parser
 *
 * Parse plugin config files (YAML or JSON) holding the plugin identity,
 * timeout behaviour and per-metric thresholds.
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { PluginError } from '../errors/index.js';
import { SeveritySchema } from '../severity/index.js';
import { parseThreshold, type ThresholdRange } from '../thresholds/index.js';

// ============================================================================
// Schemas
// ============================================================================

const isThresholdExpression = (expression: string): boolean => {
  try {
    parseThreshold(expression);
    return true;
  } catch {
    return false;
  }
};

const ThresholdExpressionSchema = z
  .string()
  .refine(isThresholdExpression, { message: 'Invalid threshold range expression' });

const MetricThresholdsSchema = z.object({
  warning: ThresholdExpressionSchema.optional(),
  critical: ThresholdExpressionSchema.optional(),
});

export const PluginConfigSchema = z.object({
  name: z.string().min(1).optional(),
  version: z.string().optional(),
  timeout: z.number().int().positive().optional(),
  timeout_status: SeveritySchema.optional(),
  thresholds: z.record(MetricThresholdsSchema).optional(),
});

// ============================================================================
// Types
// ============================================================================

export type MetricThresholds = z.infer<typeof MetricThresholdsSchema>;
export type PluginConfig = z.infer<typeof PluginConfigSchema>;

export interface ResolvedThresholds {
  warning?: ThresholdRange;
  critical?: ThresholdRange;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG = {
  timeout: 10,
  timeout_status: 'UNKNOWN',
  thresholds: {},
} as const satisfies PluginConfig;

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<PluginConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): PluginConfig {
    let parsed: unknown;

    if (filename.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      // YAML; an empty document means "all defaults"
      parsed = parseYaml(content) ?? {};
    }

    const validated = this.validate(parsed);
    return this.mergeWithDefaults(validated);
  }

  mergeWithDefaults(config: PluginConfig): PluginConfig {
    return {
      ...config,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
      timeout_status: config.timeout_status ?? DEFAULT_CONFIG.timeout_status,
      thresholds: {
        ...DEFAULT_CONFIG.thresholds,
        ...config.thresholds,
      },
    };
  }

  validate(config: unknown): PluginConfig {
    return PluginConfigSchema.parse(config);
  }

  /**
   * Parsed warning/critical ranges for one metric
   */
  getThresholds(config: PluginConfig, metric: string): ResolvedThresholds {
    const entry = config.thresholds?.[metric];
    if (!entry) {
      throw new PluginError(`No thresholds configured for metric "${metric}"`);
    }

    return {
      warning: entry.warning === undefined ? undefined : parseThreshold(entry.warning),
      critical: entry.critical === undefined ? undefined : parseThreshold(entry.critical),
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# Plugin configuration

name: check_disk
version: "1.0.0"

# seconds before the plugin gives up
timeout: 10
timeout_status: UNKNOWN

thresholds:
  percent_used:
    warning: ":90"
    critical: ":95"
  inodes_free:
    warning: "10:"
    critical: "5:"
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<PluginConfig> {
  return new ConfigParser().loadFile(path);
}

/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas with threshold expression checks
 * - Default configuration merging
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  DEFAULT_CONFIG,
  PluginConfigSchema,
  type MetricThresholds,
  type PluginConfig,
  type ResolvedThresholds,
} from './parser.js';

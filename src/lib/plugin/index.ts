/**
 * Plugin Module
 *
 * Provides:
 * - Result, perfdata and extended data recording
 * - Nagios-compatible output and exit codes
 * - Timeout and uncaught exception handling
 */

export {
  Plugin,
  createPlugin,
  type PluginIO,
  type PluginOptions,
  type ExitOptions,
} from './plugin.js';

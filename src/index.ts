/**
 * Monitoring Plugin Kit
 *
 * Build Nagios/Icinga compatible check results: a severity, a one-line
 * summary, machine-parsable performance data and extended output.
 */

// Severity and exit codes
export * from './lib/severity/index.js';

// Errors
export * from './lib/errors/index.js';

// Threshold ranges and checker
export * from './lib/thresholds/index.js';

// Result aggregation
export * from './lib/results/index.js';

// Performance data
export * from './lib/perfdata/index.js';

// Extended data
export * from './lib/extdata/index.js';

// Logging into extended data
export * from './lib/logging/index.js';

// Output rendering
export * from './lib/output/index.js';

// Configuration
export * from './lib/config/index.js';

// Plugin facade
export * from './lib/plugin/index.js';

// Version
export const VERSION = '0.1.0';

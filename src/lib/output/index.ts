/**
 * Output Module
 */

export { renderOutput, formatSummary, type PluginOutput } from './renderer.js';

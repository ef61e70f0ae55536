/**
 * Output Renderer
 *
 * First line:  <summary>[ | <perfdata>]
 * Then:        extended data, unmodified
 */

import type { Severity } from '../severity/index.js';

export interface PluginOutput {
  summary: string;
  perfdata?: string;
  extdata?: string;
}

export function renderOutput(output: PluginOutput): string {
  let text = output.summary;
  if (output.perfdata) {
    text += ` | ${output.perfdata}`;
  }
  if (output.extdata) {
    text += `\n${output.extdata}`;
  }
  return text;
}

export function formatSummary(name: string, severity: Severity, message: string): string {
  return `${name.toUpperCase()} ${severity} - ${message}`;
}

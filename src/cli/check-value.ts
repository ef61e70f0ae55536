#!/usr/bin/env node
/**
 * CLI: Check a value against thresholds
 *
 * Usage:
 *   check-value --value N [-w RANGE] [-c RANGE] [-t SECONDS] [-v]
 *
 * Example:
 *   check-value --value 93 -w :90 -c :95
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { createPlugin, verbosityToLevel, PluginError, type Plugin, type PluginOptions } from '../index.js';

const FLAGS = new Set(['--value', '-w', '--warning', '-c', '--critical', '-t', '--timeout', '-v', '--verbose']);

/**
 * Value following the first matching flag. A flag with no value after it,
 * or followed by another flag, is a usage error.
 */
function option(args: string[], ...names: string[]): string | undefined {
  for (const name of names) {
    const index = args.indexOf(name);
    if (index === -1) {
      continue;
    }
    const value = args[index + 1];
    if (value === undefined || FLAGS.has(value)) {
      throw new PluginError(`${name} requires a value`);
    }
    return value;
  }
  return undefined;
}

export function runCheckValue(args: string[], options: PluginOptions = {}): Plugin {
  const plugin = createPlugin({ name: 'check_value', ...options });

  let timeout: string | undefined;
  let rawValue: string | undefined;
  let warning: string | undefined;
  let critical: string | undefined;
  try {
    timeout = option(args, '-t', '--timeout');
    rawValue = option(args, '--value');
    warning = option(args, '-w', '--warning');
    critical = option(args, '-c', '--critical');
  } catch (error) {
    if (error instanceof PluginError) {
      plugin.die(error.message);
      return plugin;
    }
    throw error;
  }

  const seconds = timeout === undefined ? undefined : Number(timeout);
  if (seconds !== undefined && !(Number.isInteger(seconds) && seconds > 0)) {
    plugin.die('-t must be a positive number of seconds');
    return plugin;
  }
  plugin.setTimeout(seconds);

  const value = rawValue === undefined ? NaN : Number(rawValue);
  if (Number.isNaN(value)) {
    plugin.die('--value must be a number');
    return plugin;
  }

  const verbose = args.filter(arg => arg === '-v' || arg === '--verbose').length;
  const log = plugin.extdataLogger({ level: verbosityToLevel(verbose) });

  try {
    const code = plugin.checkThreshold(value, warning, critical);
    plugin.addResult(code, `value=${value}`);
    plugin.addPerfdata('value', value, { warning, critical, min: 0, max: 100 });
  } catch (error) {
    plugin.reportError(error);
  }

  log.debug(`value has been determined to be ${value}`);
  if (verbose > 2) {
    plugin.addExtdata(`thresholds: warning=${warning ?? 'none'} critical=${critical ?? 'none'}`);
  }

  plugin.finish();
  return plugin;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  runCheckValue(process.argv.slice(2));
}

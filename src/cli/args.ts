/**
 * Command-line flag parsing for the serve entry point.
 */

import { ConfigurationError } from '../api/errors.js';
import type { ConfigOverrides } from '../config/loader.js';

export interface CLIArgs {
  overrides: ConfigOverrides;
  config?: string;
  help: boolean;
}

const VALUE_FLAGS = new Set(['port', 'metrics', 'model', 'runtime', 'redis', 'config', 'log-level']);
const BOOLEAN_FLAGS = new Set(['mock', 'help']);

function parsePort(flag: string, value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port)) {
    throw new ConfigurationError(`--${flag} expects an integer, got "${value}"`);
  }
  return port;
}

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { overrides: {}, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument: ${String(arg)}`);
    }

    const body = arg.slice(2);
    const separator = body.indexOf('=');
    const key = separator === -1 ? body : body.slice(0, separator);
    const inlineValue = separator === -1 ? undefined : body.slice(separator + 1);

    if (BOOLEAN_FLAGS.has(key)) {
      const enabled = inlineValue === undefined || inlineValue === 'true';
      if (key === 'mock') {
        result.overrides.useMock = enabled;
      } else {
        result.help = enabled;
      }
      continue;
    }

    if (!VALUE_FLAGS.has(key)) {
      throw new ConfigurationError(`Unknown flag: --${key}`);
    }

    let value = inlineValue;
    if (value === undefined) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`--${key} requires a value`);
      }
      value = next;
      i++;
    }

    switch (key) {
      case 'port':
        result.overrides.port = parsePort(key, value);
        break;
      case 'metrics':
        result.overrides.metricsPort = parsePort(key, value);
        break;
      case 'model':
        result.overrides.model = value;
        break;
      case 'runtime':
        result.overrides.runtime = value;
        break;
      case 'redis':
        result.overrides.redis = value;
        break;
      case 'log-level':
        result.overrides.logLevel = value;
        break;
      case 'config':
        result.config = value;
        break;
    }
  }

  return result;
}

/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides,
 * then applies POLICY_SERVING_* environment variables and CLI flags.
 * Precedence (highest first): flags > environment variables > file > defaults.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ConfigurationError, zodErrorToConfigurationError } from '../api/errors.js';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';

export type { RuntimeConfig };

export type Environment = 'production' | 'development' | 'test';

/**
 * Values given on the command line.
 */
export interface ConfigOverrides {
  port?: number;
  metricsPort?: number;
  model?: string;
  runtime?: string;
  redis?: string;
  useMock?: boolean;
  logLevel?: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  environment?: Environment;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export const ENV_PREFIX = 'POLICY_SERVING_';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

function setPath(target: PlainObject, path: readonly string[], value: unknown): void {
  let cursor = target;
  for (const segment of path.slice(0, -1)) {
    const next = cursor[segment];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: PlainObject = {};
      cursor[segment] = created;
      cursor = created;
    }
  }
  const leaf = path[path.length - 1];
  if (leaf !== undefined) {
    cursor[leaf] = value;
  }
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

/**
 * Read the YAML file and merge the section for `environment` over its base.
 */
export function readConfigFile(configPath: string, environment: Environment): PlainObject {
  let contents: string;
  try {
    contents = readFileSync(configPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${configPath}`);
    }
    throw new ConfigurationError(`Failed to read configuration: ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(contents);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse configuration ${configPath}: ${String(error)}`);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Configuration file ${configPath} must contain a mapping`);
  }

  const { environments, ...base } = parsed;
  if (isPlainObject(environments)) {
    const envSection = environments[environment];
    if (isPlainObject(envSection)) {
      return deepMerge(base, envSection);
    }
  }

  return base;
}

/**
 * Apply POLICY_SERVING_* variables (and the standard OTLP endpoint variable).
 */
export function applyEnvironment(config: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  const output = deepMerge({}, config);
  const read = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  const port = read('PORT');
  if (port !== undefined) setPath(output, ['server', 'port'], Number(port));

  const metricsPort = read('METRICS_PORT');
  if (metricsPort !== undefined) setPath(output, ['http', 'port'], Number(metricsPort));

  const model = read('MODEL');
  if (model !== undefined) setPath(output, ['engine', 'model_path'], model);

  const runtime = read('RUNTIME');
  if (runtime !== undefined) setPath(output, ['engine', 'runtime_path'], runtime);

  const useMock = read('USE_MOCK');
  if (useMock !== undefined) setPath(output, ['engine', 'use_mock'], parseBoolean(useMock));

  const redis = read('REDIS');
  if (redis !== undefined) {
    setPath(output, ['redis', 'url'], redis);
    setPath(output, ['redis', 'enabled'], true);
  }

  const logLevel = read('LOG_LEVEL');
  if (logLevel !== undefined) setPath(output, ['logging', 'level'], logLevel.toLowerCase());

  const otelEnabled = read('OTEL_ENABLED');
  if (otelEnabled !== undefined) {
    setPath(output, ['telemetry', 'tracing_enabled'], parseBoolean(otelEnabled));
  }

  if (env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    setPath(output, ['telemetry', 'tracing_enabled'], true);
  }

  return output;
}

export function applyOverrides(config: PlainObject, overrides: ConfigOverrides): PlainObject {
  const output = deepMerge({}, config);

  if (overrides.port !== undefined) setPath(output, ['server', 'port'], overrides.port);
  if (overrides.metricsPort !== undefined) setPath(output, ['http', 'port'], overrides.metricsPort);
  if (overrides.model !== undefined) setPath(output, ['engine', 'model_path'], overrides.model);
  if (overrides.runtime !== undefined) setPath(output, ['engine', 'runtime_path'], overrides.runtime);
  if (overrides.useMock) setPath(output, ['engine', 'use_mock'], true);
  if (overrides.logLevel !== undefined) setPath(output, ['logging', 'level'], overrides.logLevel);
  if (overrides.redis !== undefined) {
    setPath(output, ['redis', 'url'], overrides.redis);
    setPath(output, ['redis', 'enabled'], true);
  }

  return output;
}

/**
 * Validate configuration values
 */
export function validateConfig(raw: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    throw zodErrorToConfigurationError(parseResult.error);
  }
  return parseResult.data;
}

/**
 * Load, merge and validate the runtime configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const env = options.env ?? process.env;
  const environment = options.environment ?? resolveEnvironment(env.NODE_ENV);
  const configPath = options.configPath ?? defaultConfigPath();

  const fromFile = readConfigFile(configPath, environment);
  const fromEnv = applyEnvironment(fromFile, env);
  const merged = applyOverrides(fromEnv, options.overrides ?? {});

  return validateConfig(merged);
}

function resolveEnvironment(nodeEnv: string | undefined): Environment {
  if (nodeEnv === 'production' || nodeEnv === 'test') {
    return nodeEnv;
  }
  return 'development';
}

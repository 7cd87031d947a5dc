import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../../../src/api/errors.js';
import {
  applyEnvironment,
  applyOverrides,
  defaultConfigPath,
  loadConfig,
  readConfigFile,
  validateConfig,
} from '../../../src/config/loader.js';

const baseConfig = {
  server: { host: '127.0.0.1', port: 50051, reflection: false },
  http: { host: '127.0.0.1', port: 9100 },
  engine: {
    model_path: 'model.onnx',
    runtime_path: 'bin/engine',
    use_mock: false,
    mock_action: [1, 2],
    startup_timeout_ms: 30000,
    request_timeout_ms: 10000,
    shutdown_timeout_ms: 5000,
  },
  redis: { enabled: false, url: 'redis://localhost:6379', pose_ttl_seconds: 0 },
  telemetry: { service_name: 'test-service', tracing_enabled: false },
  lifecycle: { drain_ms: 1000, rpc_stop_timeout_ms: 2000, http_stop_timeout_ms: 2000 },
  logging: { level: 'info' },
};

describe('Config Loader', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'policy-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, contents: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, typeof contents === 'string' ? contents : yaml.dump(contents));
    return path;
  }

  describe('shipped runtime.yaml', () => {
    it('provides the production defaults', () => {
      const config = loadConfig({ environment: 'production', env: {} });

      expect(config.server).toEqual({ host: '0.0.0.0', port: 50051, reflection: true });
      expect(config.http).toEqual({ host: '0.0.0.0', port: 9100 });
      expect(config.engine.model_path).toBe('policy_cpu.onnx');
      expect(config.engine.use_mock).toBe(false);
      expect(config.redis.enabled).toBe(false);
      expect(config.telemetry.service_name).toBe('policy-service');
      expect(config.lifecycle.drain_ms).toBe(5000);
      expect(config.logging.level).toBe('info');
    });

    it('merges the test environment section', () => {
      const config = loadConfig({ environment: 'test', env: {} });

      expect(config.engine.use_mock).toBe(true);
      expect(config.engine.mock_action).toEqual([0.1, 0.2, 0.3]);
      expect(config.lifecycle.drain_ms).toBe(0);
      expect(config.lifecycle.rpc_stop_timeout_ms).toBe(10000);
      expect(config.logging.level).toBe('silent');
    });

    it('picks the environment from NODE_ENV', () => {
      expect(loadConfig({ env: { NODE_ENV: 'test' } }).logging.level).toBe('silent');
      expect(loadConfig({ env: {} }).logging.level).toBe('debug');
    });

    it('lives under config/', () => {
      expect(defaultConfigPath().endsWith(join('config', 'runtime.yaml'))).toBe(true);
    });
  });

  describe('readConfigFile', () => {
    it('ignores an environment without a section', () => {
      const path = writeConfig('plain.yaml', baseConfig);

      expect(readConfigFile(path, 'development')).toEqual(baseConfig);
    });

    it('reports a missing file', () => {
      const path = join(dir, 'absent.yaml');

      expect(() => readConfigFile(path, 'test')).toThrow(`Configuration file not found: ${path}`);
    });

    it('reports invalid YAML', () => {
      const path = writeConfig('broken.yaml', 'server: [unterminated');

      expect(() => readConfigFile(path, 'test')).toThrow(/^Failed to parse configuration/);
    });

    it('requires a mapping at the top level', () => {
      const path = writeConfig('list.yaml', '- one\n- two\n');

      expect(() => readConfigFile(path, 'test')).toThrow(`Configuration file ${path} must contain a mapping`);
    });
  });

  describe('applyEnvironment', () => {
    it('reads POLICY_SERVING_* variables', () => {
      const merged = applyEnvironment(baseConfig, {
        POLICY_SERVING_PORT: '6000',
        POLICY_SERVING_METRICS_PORT: '6001',
        POLICY_SERVING_MODEL: 'other.onnx',
        POLICY_SERVING_USE_MOCK: 'yes',
        POLICY_SERVING_REDIS: 'redis://cache:6379',
        POLICY_SERVING_LOG_LEVEL: 'WARN',
      });
      const config = validateConfig(merged);

      expect(config.server.port).toBe(6000);
      expect(config.http.port).toBe(6001);
      expect(config.engine.model_path).toBe('other.onnx');
      expect(config.engine.use_mock).toBe(true);
      expect(config.redis).toEqual({ enabled: true, url: 'redis://cache:6379', pose_ttl_seconds: 0 });
      expect(config.logging.level).toBe('warn');
    });

    it('turns tracing on when an OTLP endpoint is set', () => {
      const config = validateConfig(applyEnvironment(baseConfig, { OTEL_EXPORTER_OTLP_ENDPOINT: 'http://collector:4318' }));

      expect(config.telemetry.tracing_enabled).toBe(true);
    });

    it('ignores empty variables and leaves the input untouched', () => {
      const merged = applyEnvironment(baseConfig, { POLICY_SERVING_PORT: '' });

      expect(merged).toEqual(baseConfig);
      expect(merged).not.toBe(baseConfig);
    });
  });

  describe('applyOverrides', () => {
    it('lets flags win over environment variables', () => {
      const path = writeConfig('flags.yaml', baseConfig);

      const config = loadConfig({
        configPath: path,
        environment: 'production',
        env: { POLICY_SERVING_PORT: '6000', POLICY_SERVING_LOG_LEVEL: 'warn' },
        overrides: { port: 7000, useMock: true },
      });

      expect(config.server.port).toBe(7000);
      expect(config.logging.level).toBe('warn');
      expect(config.engine.use_mock).toBe(true);
    });

    it('enables the pose store when a Redis URL is given', () => {
      const config = validateConfig(applyOverrides(baseConfig, { redis: 'redis://flags:6379' }));

      expect(config.redis.enabled).toBe(true);
      expect(config.redis.url).toBe('redis://flags:6379');
    });
  });

  describe('validateConfig', () => {
    it('accepts a complete configuration', () => {
      expect(validateConfig(baseConfig)).toEqual(baseConfig);
    });

    it('rejects the same port for both listeners', () => {
      const raw = { ...baseConfig, http: { ...baseConfig.http, port: 50051 } };

      expect(() => validateConfig(raw)).toThrow(ConfigurationError);
      try {
        validateConfig(raw);
      } catch (error) {
        expect(error instanceof ConfigurationError ? error.issues : []).toEqual([
          'http.port must be different from server.port',
        ]);
      }
    });

    it('allows port 0 on both listeners', () => {
      const raw = { ...baseConfig, server: { ...baseConfig.server, port: 0 }, http: { ...baseConfig.http, port: 0 } };

      expect(validateConfig(raw).server.port).toBe(0);
    });

    it('requires a model path unless the mock engine is used', () => {
      const raw = { ...baseConfig, engine: { ...baseConfig.engine, model_path: ' ' } };

      expect(() => validateConfig(raw)).toThrow(
        'Configuration validation failed:\nengine.model_path is required when not using mock inference'
      );
      expect(validateConfig({ ...raw, engine: { ...raw.engine, use_mock: true } }).engine.use_mock).toBe(true);
    });

    it('names the offending field', () => {
      const raw = { ...baseConfig, logging: { level: 'loud' } };

      expect(() => validateConfig(raw)).toThrow(/logging\.level/);
    });
  });
});

/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, with the
 * cross-field checks applied after environment and flag overrides.
 *
 * @module schemas/config
 */

import { z } from 'zod';

// 0 binds an ephemeral port.
const PortSchema = z.number().int().min(0, 'must be >= 0').max(65535, 'must be <= 65535');

/**
 * gRPC listener
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: PortSchema,
  reflection: z.boolean(),
});

/**
 * Auxiliary HTTP listener (metrics, health)
 */
export const HttpConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: PortSchema,
});

/**
 * Prediction engine
 */
export const EngineConfigSchema = z.object({
  model_path: z.string(),
  runtime_path: z.string().min(1, 'Runtime path cannot be empty'),
  use_mock: z.boolean(),
  mock_action: z.array(z.number()).min(1, 'Mock action cannot be empty'),
  startup_timeout_ms: z.number().int().min(1000, 'must be >= 1000ms'),
  request_timeout_ms: z.number().int().positive('must be positive'),
  shutdown_timeout_ms: z.number().int().positive('must be positive'),
});

/**
 * Optional pose store
 */
export const RedisConfigSchema = z.object({
  enabled: z.boolean(),
  url: z.string().min(1, 'Redis URL cannot be empty'),
  pose_ttl_seconds: z.number().int().min(0, 'must be >= 0'),
});

export const TelemetryConfigSchema = z.object({
  service_name: z.string().min(1, 'Service name cannot be empty'),
  tracing_enabled: z.boolean(),
});

export const LifecycleConfigSchema = z.object({
  drain_ms: z.number().int().min(0, 'must be >= 0'),
  rpc_stop_timeout_ms: z.number().int().positive('must be positive'),
  http_stop_timeout_ms: z.number().int().positive('must be positive'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Complete runtime configuration
 */
export const RuntimeConfigSchema = z
  .object({
    server: ServerConfigSchema,
    http: HttpConfigSchema,
    engine: EngineConfigSchema,
    redis: RedisConfigSchema,
    telemetry: TelemetryConfigSchema,
    lifecycle: LifecycleConfigSchema,
    logging: LoggingConfigSchema,
  })
  .refine((data) => data.server.port === 0 || data.server.port !== data.http.port, {
    message: 'must be different from server.port',
    path: ['http', 'port'],
  })
  .refine((data) => data.engine.use_mock || data.engine.model_path.trim().length > 0, {
    message: 'is required when not using mock inference',
    path: ['engine', 'model_path'],
  });

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * Service composition.
 *
 * Builds every component from a validated RuntimeConfig and wires them
 * into one LifecycleController. Nothing is bound until `lifecycle.start()`.
 */

import type { Logger } from 'pino';
import { connectPoseStore, type PoseStore } from '../cache/pose-store.js';
import type { RuntimeConfig } from '../config/loader.js';
import { BatchPipeline } from '../core/batch-pipeline.js';
import { MockEngine } from '../engine/mock-engine.js';
import type { PredictionEngine } from '../engine/prediction-engine.js';
import { createRuntimeEngine } from '../engine/runtime-engine.js';
import { GrpcServer } from '../server/grpc-server.js';
import { HealthRegistry, createHealthImplementation } from '../server/health.js';
import { AuxiliaryHttpServer } from '../server/http-server.js';
import { PlannerService } from '../server/planner-service.js';
import { TelemetryManager } from '../telemetry/otel.js';
import { LifecycleController } from './lifecycle-controller.js';

export interface PolicyService {
  lifecycle: LifecycleController;
  grpc: GrpcServer;
  http: AuxiliaryHttpServer;
  health: HealthRegistry;
  telemetry: TelemetryManager;
  engine: PredictionEngine;
  poseStore: PoseStore | null;
}

export interface CreatePolicyServiceOptions {
  logger: Logger;
  /**
   * Engine to serve with instead of the one described by `engine` config
   */
  engine?: PredictionEngine;
  /**
   * Pose store to use instead of connecting to `redis.url`
   */
  poseStore?: PoseStore | null;
  telemetry?: TelemetryManager;
}

export async function createEngine(config: RuntimeConfig, logger: Logger): Promise<PredictionEngine> {
  if (config.engine.use_mock) {
    logger.info({ action: config.engine.mock_action }, 'Using mock inference engine');
    return new MockEngine({ action: config.engine.mock_action });
  }

  logger.info({ modelPath: config.engine.model_path }, 'Loading model into engine runtime...');
  const engine = await createRuntimeEngine({
    runtimePath: config.engine.runtime_path,
    modelPath: config.engine.model_path,
    startupTimeoutMs: config.engine.startup_timeout_ms,
    requestTimeoutMs: config.engine.request_timeout_ms,
    shutdownTimeoutMs: config.engine.shutdown_timeout_ms,
    logger: logger.child({ component: 'engine' }),
  });
  logger.info('Model loaded successfully');
  return engine;
}

/**
 * Connect the optional pose store. A failed connection is a warning; the
 * service runs without it.
 */
export async function createPoseStore(config: RuntimeConfig, logger: Logger): Promise<PoseStore | null> {
  if (!config.redis.enabled) {
    return null;
  }

  try {
    return await connectPoseStore(config.redis.url, {
      ttlSeconds: config.redis.pose_ttl_seconds,
      logger: logger.child({ component: 'pose-store' }),
    });
  } catch (error) {
    logger.warn({ err: error }, 'Failed to connect to Redis, continuing without pose store');
    return null;
  }
}

export async function createPolicyService(
  config: RuntimeConfig,
  options: CreatePolicyServiceOptions
): Promise<PolicyService> {
  const { logger } = options;

  const telemetry =
    options.telemetry ??
    new TelemetryManager({
      serviceName: config.telemetry.service_name,
      tracingEnabled: config.telemetry.tracing_enabled,
      logger: logger.child({ component: 'telemetry' }),
    });
  if (!telemetry.isStarted()) {
    telemetry.start();
  }

  const engine = options.engine ?? (await createEngine(config, logger));
  const poseStore = options.poseStore !== undefined ? options.poseStore : await createPoseStore(config, logger);

  const health = new HealthRegistry(logger.child({ component: 'health' }));
  const pipeline = new BatchPipeline({
    engine,
    metrics: telemetry.metrics,
    logger: logger.child({ component: 'pipeline' }),
  });
  const planner = new PlannerService(pipeline);

  const grpc = new GrpcServer({
    host: config.server.host,
    port: config.server.port,
    planner: planner.implementation({ metrics: telemetry.metrics, logger, tracer: telemetry.tracer }),
    health: createHealthImplementation(health),
    stopTimeoutMs: config.lifecycle.rpc_stop_timeout_ms,
    reflection: config.server.reflection,
    logger: logger.child({ component: 'grpc' }),
  });

  const http = new AuxiliaryHttpServer({
    health,
    telemetry,
    host: config.http.host,
    port: config.http.port,
    stopTimeoutMs: config.lifecycle.http_stop_timeout_ms,
    logger: logger.child({ component: 'http' }),
  });

  const lifecycle = new LifecycleController(
    { rpc: grpc, http, health, engine, metrics: telemetry.metrics, telemetry, poseStore },
    {
      serviceName: config.telemetry.service_name,
      drainMs: config.lifecycle.drain_ms,
      logger: logger.child({ component: 'lifecycle' }),
    }
  );

  return { lifecycle, grpc, http, health, telemetry, engine, poseStore };
}

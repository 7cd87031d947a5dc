export {
  PlannerError,
  ConfigurationError,
  TimeoutError,
  toPlannerError,
  invalidArgument,
  failedPrecondition,
  internalError,
  type PlannerErrorCode,
  type PlannerErrorShape,
} from './api/errors.js';

export type * from './types/planner.js';

// Engine
export {
  EngineError,
  assertBatchShape,
  type EngineErrorKind,
  type PredictionEngine,
} from './engine/prediction-engine.js';
export { MockEngine, DEFAULT_MOCK_ACTION, type MockEngineOptions } from './engine/mock-engine.js';
export {
  RuntimeEngine,
  RunnerSession,
  createRuntimeEngine,
  type EngineSession,
  type TensorShape,
} from './engine/runtime-engine.js';
export { AsyncMutex } from './engine/async-mutex.js';
export { EngineRunner, type EngineRunnerOptions, type RunnerStatus } from './bridge/engine-runner.js';
export { JsonRpcTransport, JsonRpcError } from './bridge/jsonrpc-transport.js';

// Pipeline and RPC surface
export { BatchPipeline, validateBatch, splitActions, type PipelineContext } from './core/batch-pipeline.js';
export {
  withRequestContext,
  classifyOutcome,
  REQUEST_ID_HEADER,
  type CallOutcome,
  type RequestContext,
} from './server/request-context.js';
export { PlannerService, PLAN_METHOD, BATCH_PLAN_METHOD } from './server/planner-service.js';
export { HealthRegistry, createHealthImplementation, type ServingStatus } from './server/health.js';
export { GrpcServer, loadServiceDefinitions } from './server/grpc-server.js';
export { AuxiliaryHttpServer } from './server/http-server.js';

// Telemetry, config, lifecycle
export { TelemetryManager, ServiceMetrics, type TelemetryConfig } from './telemetry/otel.js';
export { loadConfig, type RuntimeConfig, type ConfigOverrides } from './config/loader.js';
export { RedisPoseStore, connectPoseStore, poseKey, type PoseStore } from './cache/pose-store.js';
export {
  LifecycleController,
  LifecycleError,
  type LifecycleState,
} from './services/lifecycle-controller.js';
export { createPolicyService, type PolicyService } from './services/service-factory.js';
export { createRootLogger } from './utils/logger.js';

#!/usr/bin/env node

/**
 * policy-serving CLI
 *
 * Usage:
 *   policy-serving [options]
 */

import { ConfigurationError } from '../api/errors.js';
import { loadConfig } from '../config/loader.js';
import { createPolicyService } from '../services/service-factory.js';
import { createRootLogger } from '../utils/logger.js';
import { parseArgs } from './args.js';

function printHelp(): void {
  console.log(`
policy-serving - gRPC inference front end for robot policies

USAGE:
  policy-serving [options]

OPTIONS:
  --port <port>                         gRPC server port (default: 50051)
  --metrics <port>                      Metrics and health HTTP port (default: 9100)
  --model <path>                        Model file handed to the engine runtime
  --runtime <path>                      Engine runtime executable
  --redis <url>                         Redis URL for the pose store (enables it)
  --config <path>                       Configuration file (default: config/runtime.yaml)
  --log-level <level>                   trace|debug|info|warn|error|fatal|silent
  --mock                                Use the mock inference engine
  --help                                Show this help message

ENVIRONMENT VARIABLES:
  POLICY_SERVING_PORT, POLICY_SERVING_METRICS_PORT, POLICY_SERVING_MODEL,
  POLICY_SERVING_RUNTIME, POLICY_SERVING_REDIS, POLICY_SERVING_USE_MOCK,
  POLICY_SERVING_LOG_LEVEL, POLICY_SERVING_OTEL_ENABLED,
  OTEL_EXPORTER_OTLP_ENDPOINT           Enables tracing when set
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return;
  }

  const config = loadConfig({ configPath: args.config, overrides: args.overrides });
  const logger = createRootLogger(config.logging.level);

  logger.info(
    {
      port: config.server.port,
      metricsPort: config.http.port,
      model: config.engine.model_path,
      mock: config.engine.use_mock,
      redis: config.redis.enabled ? config.redis.url : null,
      tracing: config.telemetry.tracing_enabled,
    },
    `Starting ${config.telemetry.service_name}...`
  );

  const service = await createPolicyService(config, { logger });
  await service.lifecycle.start();

  const onSignal = (signal: NodeJS.Signals): void => {
    void service.lifecycle.beginShutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});

/**
 * gRPC listener
 *
 * Loads the service definitions from proto/ at run time and serves the
 * PathPlanner and Health services on one insecure listener, with server
 * reflection over the same definitions when enabled.
 */

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  Server,
  ServerCredentials,
  loadPackageDefinition,
  type GrpcObject,
  type ServiceDefinition,
  type UntypedServiceImplementation,
} from '@grpc/grpc-js';
import { loadSync, type Options, type PackageDefinition } from '@grpc/proto-loader';
import { ReflectionService } from '@grpc/reflection';
import type { Logger } from 'pino';

export const PROTO_LOADER_OPTIONS: Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export interface GrpcServerOptions {
  host: string;
  port: number;
  planner: UntypedServiceImplementation;
  health: UntypedServiceImplementation;
  /**
   * Graceful stop budget before in-flight calls are cancelled (ms, default: 10000)
   */
  stopTimeoutMs?: number;
  /**
   * Serve grpc.reflection for the loaded protos (default: false)
   */
  reflection?: boolean;
  protoDir?: string;
  logger?: Logger;
}

function findProtoDir(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    const candidate = join(currentDir, 'proto');
    if (existsSync(join(candidate, 'planner.proto'))) {
      return candidate;
    }
    currentDir = dirname(currentDir);
  }

  return join(process.cwd(), 'proto');
}

function lookupService(root: GrpcObject, path: readonly string[]): ServiceDefinition {
  let node: GrpcObject | undefined = root;
  for (const segment of path.slice(0, -1)) {
    const next: unknown = node?.[segment];
    node = isGrpcObject(next) ? next : undefined;
  }

  const leaf = path[path.length - 1];
  const ctor = leaf !== undefined ? node?.[leaf] : undefined;
  if (typeof ctor === 'function' && 'service' in ctor) {
    return ctor.service;
  }
  throw new Error(`Service ${path.join('.')} not found in proto definitions`);
}

function isGrpcObject(value: unknown): value is GrpcObject {
  return typeof value === 'object' && value !== null;
}

export interface ServiceDefinitions {
  planner: ServiceDefinition;
  health: ServiceDefinition;
  /**
   * Raw definition of both protos, descriptors included
   */
  packageDefinition: PackageDefinition;
}

/**
 * Service definitions for planner.PathPlanner and grpc.health.v1.Health.
 */
export function loadServiceDefinitions(protoDir: string = findProtoDir()): ServiceDefinitions {
  const packageDefinition = loadSync([join(protoDir, 'planner.proto'), join(protoDir, 'health.proto')], {
    ...PROTO_LOADER_OPTIONS,
    includeDirs: [protoDir],
  });
  const root = loadPackageDefinition(packageDefinition);

  return {
    planner: lookupService(root, ['planner', 'PathPlanner']),
    health: lookupService(root, ['grpc', 'health', 'v1', 'Health']),
    packageDefinition,
  };
}

export class GrpcServer {
  private readonly server = new Server();
  private readonly options: GrpcServerOptions;
  private readonly logger?: Logger;
  private boundPort: number | null = null;

  constructor(options: GrpcServerOptions) {
    this.options = options;
    this.logger = options.logger;

    const definitions = loadServiceDefinitions(options.protoDir);
    this.server.addService(definitions.planner, options.planner);
    this.server.addService(definitions.health, options.health);

    if (options.reflection) {
      new ReflectionService(definitions.packageDefinition).addToServer(this.server);
      this.logger?.debug('gRPC server reflection enabled');
    }
  }

  /**
   * Bind the listener and start serving.
   *
   * @returns the bound port (useful with port 0)
   */
  public async start(): Promise<number> {
    const address = `${this.options.host}:${this.options.port}`;
    const port = await new Promise<number>((resolve, reject) => {
      this.server.bindAsync(address, ServerCredentials.createInsecure(), (error, bound) => {
        if (error) {
          reject(new Error(`Failed to listen on ${address}: ${error.message}`));
          return;
        }
        resolve(bound);
      });
    });

    this.boundPort = port;
    this.logger?.info({ host: this.options.host, port }, 'gRPC server listening');
    return port;
  }

  public getPort(): number | null {
    return this.boundPort;
  }

  /**
   * Let in-flight calls finish; cancel whatever is left after the stop timeout.
   */
  public async stop(): Promise<void> {
    const timeoutMs = this.options.stopTimeoutMs ?? 10000;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.logger?.warn({ timeoutMs }, 'gRPC graceful stop timed out, forcing shutdown');
        this.server.forceShutdown();
        resolve();
      }, timeoutMs);

      this.server.tryShutdown((error) => {
        clearTimeout(timer);
        if (error) {
          this.logger?.warn({ err: error }, 'gRPC graceful stop failed, forcing shutdown');
          this.server.forceShutdown();
        }
        resolve();
      });
    });

    this.boundPort = null;
    this.logger?.info('gRPC server stopped');
  }
}

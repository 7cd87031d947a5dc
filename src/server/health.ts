/**
 * gRPC health checking (grpc.health.v1).
 *
 * The registry is the single source of the serving status; the gRPC
 * handlers and the HTTP probes both read from it.
 */

import {
  status,
  type ServerUnaryCall,
  type ServerWritableStream,
  type handleServerStreamingCall,
  type handleUnaryCall,
  type sendUnaryData,
} from '@grpc/grpc-js';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

/**
 * Service name of the overall server health.
 */
export const OVERALL_SERVICE = '';

export interface HealthCheckRequest {
  service: string;
}

export interface HealthCheckResponse {
  status: ServingStatus;
}

// A type alias, not an interface, so it stays assignable to grpc-js' UntypedServiceImplementation.
export type HealthImplementation = {
  Check: handleUnaryCall<HealthCheckRequest, HealthCheckResponse>;
  Watch: handleServerStreamingCall<HealthCheckRequest, HealthCheckResponse>;
};

export interface HealthRegistryEvents {
  change: (service: string, status: ServingStatus) => void;
  close: () => void;
}

export class HealthRegistry extends EventEmitter<HealthRegistryEvents> {
  private readonly statuses = new Map<string, ServingStatus>();
  private closed = false;

  constructor(private readonly logger?: Logger) {
    super();
    this.statuses.set(OVERALL_SERVICE, 'NOT_SERVING');
  }

  public setStatus(service: string, next: ServingStatus): void {
    const previous = this.statuses.get(service);
    this.statuses.set(service, next);
    if (previous !== next) {
      this.logger?.info({ service: service || '(overall)', status: next }, 'Health status changed');
      this.emit('change', service, next);
    }
  }

  /**
   * Status of `service`, or undefined when it was never registered.
   */
  public getStatus(service: string): ServingStatus | undefined {
    return this.statuses.get(service);
  }

  public isServing(service: string = OVERALL_SERVICE): boolean {
    return this.statuses.get(service) === 'SERVING';
  }

  /**
   * End every open Watch stream; a graceful RPC stop waits on them otherwise.
   * Watch calls arriving afterwards are ended right after their first write.
   */
  public closeWatchers(): void {
    this.closed = true;
    this.emit('close');
  }

  public isClosed(): boolean {
    return this.closed;
  }
}

export function createHealthImplementation(registry: HealthRegistry): HealthImplementation {
  const check = (
    call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
    callback: sendUnaryData<HealthCheckResponse>
  ): void => {
    const current = registry.getStatus(call.request.service);
    if (current === undefined) {
      callback({ code: status.NOT_FOUND, details: 'unknown service' });
      return;
    }
    callback(null, { status: current });
  };

  const watch = (call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): void => {
    const service = call.request.service;
    let last: ServingStatus = registry.getStatus(service) ?? 'SERVICE_UNKNOWN';
    call.write({ status: last });

    if (registry.isClosed()) {
      call.end();
      return;
    }

    const onChange = (changed: string, next: ServingStatus): void => {
      if (changed !== service || next === last) {
        return;
      }
      last = next;
      call.write({ status: next });
    };
    const onClose = (): void => {
      cleanup();
      call.end();
    };
    const cleanup = (): void => {
      registry.off('change', onChange);
      registry.off('close', onClose);
    };

    registry.on('change', onChange);
    registry.on('close', onClose);
    call.on('cancelled', cleanup);
  };

  return { Check: check, Watch: watch };
}

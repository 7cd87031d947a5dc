/**
 * Request Context Propagation
 *
 * Wraps every unary RPC handler with request-id correlation, a per-call
 * child logger, latency recording labelled by method and outcome, and an
 * optional server span. The wrapped handler's response and error pass
 * through untouched.
 */

import { randomUUID } from 'node:crypto';
import {
  Metadata,
  status,
  type ServerErrorResponse,
  type ServerUnaryCall,
  type sendUnaryData,
} from '@grpc/grpc-js';
import type { ServerStatusResponse } from '@grpc/grpc-js/build/src/server-call.js';
import { SpanKind, SpanStatusCode, type Span, type Tracer } from '@opentelemetry/api';
import type { Logger } from 'pino';
import type { ServiceMetrics } from '../telemetry/otel.js';

export const REQUEST_ID_HEADER = 'x-request-id';

export type CallOutcome = 'OK' | 'INVALID_ARGUMENT' | 'FAILED_PRECONDITION' | 'INTERNAL' | 'UNKNOWN';

export interface RequestContext {
  requestId: string;
  /**
   * Full method name, e.g. `/planner.PathPlanner/Plan`
   */
  method: string;
  logger?: Logger;
}

/**
 * Unary handler that also receives the call's request context.
 */
export type ContextualUnaryHandler<Req, Res> = (
  call: ServerUnaryCall<Req, Res>,
  callback: sendUnaryData<Res>,
  context: RequestContext
) => void;

export type UnaryHandler<Req, Res> = (call: ServerUnaryCall<Req, Res>, callback: sendUnaryData<Res>) => void;

export interface RequestContextDeps {
  metrics?: ServiceMetrics;
  logger?: Logger;
  tracer?: Tracer | null;
}

/**
 * Inbound `x-request-id`, when the caller supplied a non-empty one.
 */
export function readRequestId(metadata: Metadata): string | undefined {
  for (const value of metadata.get(REQUEST_ID_HEADER)) {
    const text = typeof value === 'string' ? value : value.toString('utf8');
    if (text.length > 0) {
      return text;
    }
  }
  return undefined;
}

export function classifyOutcome(error: ServerErrorResponse | ServerStatusResponse | null | undefined): CallOutcome {
  if (error === null || error === undefined) {
    return 'OK';
  }
  switch (error.code) {
    case status.OK:
      return 'OK';
    case status.INVALID_ARGUMENT:
      return 'INVALID_ARGUMENT';
    case status.FAILED_PRECONDITION:
      return 'FAILED_PRECONDITION';
    case status.INTERNAL:
      return 'INTERNAL';
    default:
      return 'UNKNOWN';
  }
}

export function withRequestContext<Req, Res>(
  method: string,
  handler: ContextualUnaryHandler<Req, Res>,
  deps: RequestContextDeps = {}
): UnaryHandler<Req, Res> {
  return (call, callback) => {
    const startTime = performance.now();
    const requestId = readRequestId(call.metadata) ?? randomUUID();

    const outbound = new Metadata();
    outbound.set(REQUEST_ID_HEADER, requestId);
    call.sendMetadata(outbound);

    const logger = deps.logger?.child({ requestId, method });
    const span: Span | undefined = deps.tracer?.startSpan(method, {
      kind: SpanKind.SERVER,
      attributes: { 'rpc.system': 'grpc', 'rpc.method': method, 'request.id': requestId },
    });

    let finished = false;
    const finish: sendUnaryData<Res> = (error, value, trailer, flags) => {
      if (!finished) {
        finished = true;
        const outcome = classifyOutcome(error);
        const seconds = (performance.now() - startTime) / 1000;
        deps.metrics?.recordCall(method, outcome, seconds);

        if (span) {
          span.setAttribute('rpc.grpc.status_code', error?.code ?? status.OK);
          if (outcome !== 'OK') {
            span.setStatus({ code: SpanStatusCode.ERROR, message: error?.details });
          }
          span.end();
        }

        logger?.debug({ code: outcome, durationMs: Number((seconds * 1000).toFixed(3)) }, 'RPC finished');
      }

      callback(error, value, trailer, flags);
    };

    handler(call, finish, { requestId, method, logger });
  };
}

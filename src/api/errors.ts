/**
 * Planner error utilities.
 *
 * Provides the error type surfaced by every RPC method and helpers to
 * convert lower-level engine and transport errors into PlannerError
 * instances whose code maps onto a gRPC status.
 */

import { status } from '@grpc/grpc-js';
import type { ZodError } from 'zod';
import { EngineError } from '../engine/prediction-engine.js';

/**
 * Error classes surfaced to RPC callers.
 *
 * - `InvalidArgument`: caller fault, the request is structurally wrong.
 * - `FailedPrecondition`: the engine is not initialized or already released.
 * - `Internal`: engine failure or output contract violation.
 */
export type PlannerErrorCode = 'InvalidArgument' | 'FailedPrecondition' | 'Internal';

export interface PlannerErrorShape {
  code: PlannerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

const GRPC_STATUS_BY_CODE: Readonly<Record<PlannerErrorCode, status>> = {
  InvalidArgument: status.INVALID_ARGUMENT,
  FailedPrecondition: status.FAILED_PRECONDITION,
  Internal: status.INTERNAL,
};

/**
 * Error implementation returned by the planner service.
 */
export class PlannerError extends Error implements PlannerErrorShape {
  public readonly code: PlannerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: PlannerErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PlannerError';
    this.code = code;
    this.details = details;
  }

  /**
   * gRPC status code for this error.
   */
  public toStatus(): status {
    return GRPC_STATUS_BY_CODE[this.code];
  }

  /**
   * Serialize error into plain shape (for logs).
   */
  public toObject(): PlannerErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function invalidArgument(message: string, details?: Record<string, unknown>): PlannerError {
  return new PlannerError('InvalidArgument', message, details);
}

export function failedPrecondition(message: string, details?: Record<string, unknown>): PlannerError {
  return new PlannerError('FailedPrecondition', message, details);
}

export function internalError(message: string, details?: Record<string, unknown>): PlannerError {
  return new PlannerError('Internal', message, details);
}

/**
 * Map unknown errors into PlannerError instances.
 *
 * Engine errors are classified by kind; anything else becomes an
 * internal fault carrying the original message for diagnostics.
 */
export function toPlannerError(error: unknown): PlannerError {
  if (error instanceof PlannerError) {
    return error;
  }

  if (error instanceof EngineError) {
    switch (error.kind) {
      case 'empty_batch':
        return invalidArgument('empty observation batch');
      case 'shape_mismatch':
        return invalidArgument(`observation shape mismatch: ${error.message}`, error.details);
      case 'not_ready':
        return failedPrecondition('inference engine not initialized');
      case 'inference_failed':
        return internalError(`inference execution failed: ${error.message}`);
    }
  }

  if (error instanceof Error) {
    return internalError(`internal error: ${error.message}`);
  }

  return internalError(`internal error: ${String(error)}`);
}

/**
 * Timeout error with additional context
 */
export class TimeoutError extends Error {
  public readonly method: string;
  public readonly timeout: number;
  public readonly requestId?: string;
  public readonly duration?: number;

  constructor(
    message: string,
    details: {
      method: string;
      timeout: number;
      requestId?: string;
      duration?: number;
    }
  ) {
    super(message);
    this.name = 'TimeoutError';
    this.method = details.method;
    this.timeout = details.timeout;
    this.requestId = details.requestId;
    this.duration = details.duration;
  }
}

export function createTimeoutError(
  method: string,
  timeout: number,
  requestId?: string,
  duration?: number
): TimeoutError {
  const message = `Request timed out after ${timeout}ms: ${method}${requestId ? ` (id: ${requestId})` : ''}`;
  return new TimeoutError(message, { method, timeout, requestId, duration });
}

/**
 * Configuration loading or validation failure.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Convert Zod validation error to ConfigurationError
 *
 * @example
 * ```typescript
 * const result = ServiceConfigSchema.safeParse(raw);
 * if (!result.success) {
 *   throw zodErrorToConfigurationError(result.error);
 * }
 * ```
 */
export function zodErrorToConfigurationError(error: ZodError): ConfigurationError {
  const issues = error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });

  return new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, issues);
}

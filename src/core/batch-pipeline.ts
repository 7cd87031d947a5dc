/**
 * Batch Pipeline
 *
 * Validates a batch of plan requests, runs exactly one forward pass over
 * the whole batch and splits the flat engine output back into one action
 * vector per request, preserving request order.
 */

import type { Logger } from 'pino';
import type { BatchPlanRequest, BatchPlanResponse, ObservationDims, PlanResponse } from '../types/planner.js';
import { dimsSize, formatDims } from '../types/planner.js';
import type { PredictionEngine } from '../engine/prediction-engine.js';
import type { ServiceMetrics } from '../telemetry/otel.js';
import {
  failedPrecondition,
  internalError,
  invalidArgument,
  toPlannerError,
} from '../api/errors.js';

export interface BatchPipelineOptions {
  engine: PredictionEngine;
  metrics?: ServiceMetrics;
  logger?: Logger;
}

/**
 * Per-call values carried from the RPC layer.
 */
export interface PipelineContext {
  requestId?: string;
  logger?: Logger;
}

interface ValidatedBatch {
  dims: ObservationDims;
  buffers: Array<ArrayLike<number>>;
}

export class BatchPipeline {
  private readonly engine: PredictionEngine;
  private readonly metrics?: ServiceMetrics;
  private readonly logger?: Logger;

  constructor(options: BatchPipelineOptions) {
    this.engine = options.engine;
    this.metrics = options.metrics;
    this.logger = options.logger;
  }

  /**
   * Run one batch through the engine.
   *
   * @throws PlannerError on invalid input, a released engine or an engine failure
   */
  public async run(
    batch: BatchPlanRequest | null | undefined,
    context: PipelineContext = {}
  ): Promise<BatchPlanResponse> {
    const logger = context.logger ?? this.logger;
    const startTime = performance.now();

    const requests = batch?.requests;
    if (!requests || requests.length === 0) {
      const error = invalidArgument('batch request cannot be nil or empty');
      logger?.warn({ err: error, requestId: context.requestId }, 'Rejected invalid batch');
      throw error;
    }

    const batchSize = requests.length;

    if (!this.engine.isReady()) {
      const error = failedPrecondition('inference engine not initialized');
      logger?.error({ requestId: context.requestId, batchSize }, error.message);
      throw error;
    }

    // Sampled before element checks, so rejected batches are counted too.
    this.metrics?.recordBatchSize(batchSize);

    let validated: ValidatedBatch;
    try {
      validated = validateBatch(batch);
    } catch (error) {
      logger?.warn({ err: error, requestId: context.requestId, batchSize }, 'Rejected invalid batch');
      throw error;
    }

    const inferenceStart = performance.now();
    let output: Float32Array;
    try {
      output = await this.engine.predict(validated.buffers, validated.dims);
    } catch (error) {
      const plannerError = toPlannerError(error);
      logger?.error(
        { err: error, requestId: context.requestId, batchSize, code: plannerError.code },
        'Batch inference failed'
      );
      throw plannerError;
    } finally {
      this.metrics?.recordEngineLatency((performance.now() - inferenceStart) / 1000);
    }
    const inferenceMs = performance.now() - inferenceStart;

    let responses: PlanResponse[];
    try {
      responses = splitActions(output, batchSize);
    } catch (error) {
      logger?.error({ err: error, requestId: context.requestId, batchSize }, 'Engine output rejected');
      throw error;
    }

    logger?.info(
      {
        requestId: context.requestId,
        batchSize,
        actionDim: responses[0]?.action.length ?? 0,
        inferenceMs: Number(inferenceMs.toFixed(3)),
        totalMs: Number((performance.now() - startTime).toFixed(3)),
      },
      'BatchPlan completed'
    );

    return { responses };
  }
}

/**
 * Structural checks, fail fast on the first violation.
 */
export function validateBatch(batch: BatchPlanRequest | null | undefined): ValidatedBatch {
  const requests = batch?.requests;
  if (!requests || requests.length === 0) {
    throw invalidArgument('batch request cannot be nil or empty');
  }

  const buffers: Array<ArrayLike<number>> = [];
  let dims: ObservationDims | null = null;
  let expectedSize = 0;

  for (let i = 0; i < requests.length; i++) {
    const request = requests[i];
    if (request === null || request === undefined) {
      throw invalidArgument(`request ${i} is nil`);
    }

    const obs = request.obs;
    if (obs === null || obs === undefined) {
      throw invalidArgument(`request ${i} has nil observation`);
    }

    const current: ObservationDims = { channels: obs.channels, height: obs.height, width: obs.width };

    if (dims === null) {
      if (!(current.channels > 0 && current.height > 0 && current.width > 0)) {
        throw invalidArgument(
          `invalid observation dimensions: channels=${current.channels}, height=${current.height}, width=${current.width}`
        );
      }
      dims = current;
      expectedSize = dimsSize(current);
    } else if (
      current.channels !== dims.channels ||
      current.height !== dims.height ||
      current.width !== dims.width
    ) {
      throw invalidArgument(
        `observation ${i} has mismatched dimensions: got ${formatDims(current)}, expected ${formatDims(dims)}`
      );
    }

    if (obs.data.length !== expectedSize) {
      throw invalidArgument(
        `observation ${i} has wrong data length: got ${obs.data.length}, expected ${expectedSize}`
      );
    }

    buffers.push(obs.data);
  }

  if (dims === null) {
    throw invalidArgument('batch request cannot be nil or empty');
  }

  return { dims, buffers };
}

/**
 * Cut the flat engine output into `batchSize` contiguous action vectors.
 */
export function splitActions(output: ArrayLike<number>, batchSize: number): PlanResponse[] {
  if (batchSize <= 0 || output.length % batchSize !== 0) {
    throw internalError(`action output size mismatch: got ${output.length} actions for batch ${batchSize}`);
  }

  const actionDim = output.length / batchSize;
  const responses: PlanResponse[] = [];
  for (let i = 0; i < batchSize; i++) {
    const action: number[] = [];
    for (let j = i * actionDim; j < (i + 1) * actionDim; j++) {
      action.push(output[j] ?? 0);
    }
    responses.push({ action, safe: true });
  }
  return responses;
}

/**
 * Prediction engine contract.
 *
 * Both the live runtime engine and the deterministic mock implement this
 * interface; the batch pipeline and its tests depend only on it.
 */

import type { ObservationDims } from '../types/planner.js';

export type EngineErrorKind = 'empty_batch' | 'shape_mismatch' | 'not_ready' | 'inference_failed';

/**
 * Failure raised by an engine implementation.
 */
export class EngineError extends Error {
  public readonly kind: EngineErrorKind;
  public readonly details?: Record<string, unknown>;

  constructor(kind: EngineErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EngineError';
    this.kind = kind;
    this.details = details;
  }
}

export interface PredictionEngine {
  /**
   * Run one forward pass over the batch.
   *
   * @param observations - Flat observation buffers, each of length C*H*W, in batch order
   * @param dims - Shape shared by every observation
   * @returns Flat actions of length `observations.length * actionDim`
   */
  predict(observations: ReadonlyArray<ArrayLike<number>>, dims: ObservationDims): Promise<Float32Array>;

  /**
   * Release the underlying session. Calling it again is a no-op.
   */
  release(): Promise<void>;

  /**
   * Whether `predict` can currently be invoked.
   */
  isReady(): boolean;

  /**
   * Register a callback for the engine failing outside of a call, such as
   * its runtime process dying. Engines that cannot fail that way omit it.
   */
  onFailure?(listener: (reason: string) => void): void;
}

/**
 * Shared input checks performed by every engine before a forward pass.
 *
 * @returns the per-observation element count
 */
export function assertBatchShape(
  observations: ReadonlyArray<ArrayLike<number>>,
  dims: ObservationDims
): number {
  if (observations.length === 0) {
    throw new EngineError('empty_batch', 'empty observation batch');
  }

  const expected = dims.channels * dims.height * dims.width;
  observations.forEach((obs, index) => {
    if (obs.length !== expected) {
      throw new EngineError(
        'shape_mismatch',
        `observation ${index} has wrong size: got ${obs.length}, expected ${expected}`,
        { index, actual: obs.length, expected }
      );
    }
  });

  return expected;
}

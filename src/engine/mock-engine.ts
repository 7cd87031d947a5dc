/**
 * Deterministic prediction engine for tests and `--mock` mode.
 *
 * Returns the configured action vector once per observation without
 * touching any model runtime.
 */

import type { ObservationDims } from '../types/planner.js';
import { EngineError, assertBatchShape, type PredictionEngine } from './prediction-engine.js';

export const DEFAULT_MOCK_ACTION: readonly number[] = [0.1, 0.2, 0.3];

const DEFAULT_ERROR_MESSAGE = 'mock inference error';

export interface MockEngineOptions {
  /**
   * Action returned for every observation (default: [0.1, 0.2, 0.3]).
   */
  action?: readonly number[];
  /**
   * Artificial latency per predict call in milliseconds (default: 0).
   */
  latencyMs?: number;
}

export class MockEngine implements PredictionEngine {
  private action: number[];
  private readonly latencyMs: number;
  private failure: string | null = null;
  private released = false;
  private calls = 0;

  constructor(options: MockEngineOptions = {}) {
    this.action = [...(options.action ?? DEFAULT_MOCK_ACTION)];
    this.latencyMs = options.latencyMs ?? 0;
  }

  /**
   * Number of predict invocations, including failed ones.
   */
  public get callCount(): number {
    return this.calls;
  }

  public get actionDim(): number {
    return this.action.length;
  }

  public async predict(
    observations: ReadonlyArray<ArrayLike<number>>,
    dims: ObservationDims
  ): Promise<Float32Array> {
    this.calls += 1;

    if (this.released) {
      throw new EngineError('not_ready', 'inference session is released');
    }

    if (this.failure !== null) {
      throw new EngineError('inference_failed', this.failure);
    }

    assertBatchShape(observations, dims);

    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }

    const result = new Float32Array(observations.length * this.action.length);
    for (let i = 0; i < observations.length; i++) {
      result.set(this.action, i * this.action.length);
    }
    return result;
  }

  public async release(): Promise<void> {
    this.released = true;
  }

  public isReady(): boolean {
    return !this.released;
  }

  /**
   * Make every following predict call fail with `message`.
   */
  public setError(message: string = DEFAULT_ERROR_MESSAGE): void {
    this.failure = message || DEFAULT_ERROR_MESSAGE;
  }

  public clearError(): void {
    this.failure = null;
  }

  public setAction(action: readonly number[]): void {
    this.action = [...action];
  }
}

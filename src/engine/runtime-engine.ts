/**
 * Live prediction engine.
 *
 * Owns one session with the engine runtime. Every predict call packs the
 * batch into a single contiguous [batch, C, H, W] tensor and performs one
 * forward pass; calls are serialized because the underlying session is
 * not reentrant.
 */

import type { Logger } from 'pino';
import type { ObservationDims } from '../types/planner.js';
import { EngineRunner, type EngineRunnerOptions, type RunnerStatus } from '../bridge/engine-runner.js';
import { JsonRpcError, type JsonRpcTransport } from '../bridge/jsonrpc-transport.js';
import { JsonRpcErrorCode, PredictResultSchema, type PredictParams } from '../bridge/serializers.js';
import { AsyncMutex } from './async-mutex.js';
import { EngineError, assertBatchShape, type PredictionEngine } from './prediction-engine.js';

export type TensorShape = readonly [batch: number, channels: number, height: number, width: number];

/**
 * One model session. `run` must never be called concurrently.
 */
export interface EngineSession {
  run(input: Float32Array, shape: TensorShape): Promise<Float32Array>;
  close(): Promise<void>;
  /**
   * False once the session can no longer run, even though it was never closed.
   */
  isAlive(): boolean;
  onFailure?(listener: (reason: string) => void): void;
}

export interface RuntimeEngineOptions {
  logger?: Logger;
}

export class RuntimeEngine implements PredictionEngine {
  private session: EngineSession | null;
  private readonly mutex = new AsyncMutex();
  private readonly logger?: Logger;

  constructor(session: EngineSession, options: RuntimeEngineOptions = {}) {
    this.session = session;
    this.logger = options.logger;
  }

  public async predict(
    observations: ReadonlyArray<ArrayLike<number>>,
    dims: ObservationDims
  ): Promise<Float32Array> {
    return this.mutex.runExclusive(async () => {
      const session = this.session;
      if (session === null) {
        throw new EngineError('not_ready', 'inference session is nil');
      }

      const obsSize = assertBatchShape(observations, dims);

      const tensor = new Float32Array(observations.length * obsSize);
      observations.forEach((obs, index) => {
        tensor.set(obs, index * obsSize);
      });

      const shape: TensorShape = [observations.length, dims.channels, dims.height, dims.width];
      try {
        return await session.run(tensor, shape);
      } catch (error) {
        if (error instanceof EngineError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new EngineError('inference_failed', `inference failed: ${message}`);
      }
    });
  }

  /**
   * Tear down the session. Waits for an in-flight forward pass first.
   */
  public async release(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const session = this.session;
      if (session === null) {
        return;
      }

      this.session = null;
      await session.close();
      this.logger?.info('Inference session released');
    });
  }

  public isReady(): boolean {
    return this.session !== null && this.session.isAlive();
  }

  public onFailure(listener: (reason: string) => void): void {
    this.session?.onFailure?.(listener);
  }
}

/**
 * What a RunnerSession needs from the runtime process manager.
 */
export interface RunnerHandle {
  readonly requestTimeoutMs: number;
  getTransport(): JsonRpcTransport | null;
  getStatus(): RunnerStatus;
  stop(): Promise<void>;
  on(event: 'exit', listener: (code: number | null, requested: boolean) => void): unknown;
}

/**
 * Session backed by a spawned engine runtime process.
 */
export class RunnerSession implements EngineSession {
  constructor(private readonly runner: RunnerHandle) {}

  public async run(input: Float32Array, shape: TensorShape): Promise<Float32Array> {
    const transport = this.runner.getTransport();
    if (!transport) {
      throw new EngineError('not_ready', 'engine runtime transport unavailable');
    }

    const params: PredictParams = {
      shape: [shape[0], shape[1], shape[2], shape[3]],
      data: Array.from(input),
    };

    let raw: unknown;
    try {
      raw = await transport.request('predict', params, {
        timeout: this.runner.requestTimeoutMs,
      });
    } catch (error) {
      if (error instanceof JsonRpcError && error.is(JsonRpcErrorCode.ShapeError)) {
        throw new EngineError('shape_mismatch', error.message);
      }
      throw error;
    }

    const result = PredictResultSchema.safeParse(raw);
    if (!result.success) {
      throw new EngineError('inference_failed', 'engine runtime returned a malformed predict result');
    }
    return Float32Array.from(result.data.actions);
  }

  public async close(): Promise<void> {
    await this.runner.stop();
  }

  public isAlive(): boolean {
    return this.runner.getStatus() === 'ready' && this.runner.getTransport() !== null;
  }

  public onFailure(listener: (reason: string) => void): void {
    this.runner.on('exit', (code, requested) => {
      if (!requested) {
        listener(`engine runtime exited unexpectedly (code: ${code ?? 'null'})`);
      }
    });
  }
}

/**
 * Spawn the engine runtime and wrap it in a RuntimeEngine.
 */
export async function createRuntimeEngine(options: EngineRunnerOptions): Promise<RuntimeEngine> {
  const runner = new EngineRunner(options);
  await runner.start();
  return new RuntimeEngine(new RunnerSession(runner), { logger: options.logger });
}

/**
 * Engine Runtime Process Manager
 *
 * Manages the lifecycle of the prediction engine binary:
 * - Spawns the runtime with the configured model
 * - Connects the JSON-RPC transport to its stdio
 * - Probes readiness through `runtime/info`
 * - Graceful shutdown with a forced kill fallback
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { JsonRpcTransport } from './jsonrpc-transport.js';
import { RuntimeInfoResponseSchema, type RuntimeInfoResponse } from './serializers.js';

export interface EngineRunnerOptions {
  /**
   * Path to the engine runtime executable
   */
  runtimePath: string;

  /**
   * Path to the model file handed to the runtime
   */
  modelPath: string;

  /**
   * Timeout for process startup and readiness probe (ms, default: 30000)
   */
  startupTimeoutMs?: number;

  /**
   * Timeout for each predict request (ms, default: 10000)
   */
  requestTimeoutMs?: number;

  /**
   * Time to wait for a graceful exit before SIGKILL (ms, default: 5000)
   */
  shutdownTimeoutMs?: number;

  logger?: Logger;
}

export type RunnerStatus = 'stopped' | 'starting' | 'ready' | 'error';

export type EngineRunnerEvents = {
  /** `requested` is false when the runtime died without a stop or failed start */
  exit: (code: number | null, requested: boolean) => void;
};

export class EngineRunner extends EventEmitter<EngineRunnerEvents> {
  private process: ChildProcess | null = null;
  private transport: JsonRpcTransport | null = null;
  private status: RunnerStatus = 'stopped';
  private shutdownRequested = false;
  private readonly options: Required<Omit<EngineRunnerOptions, 'logger'>>;
  private readonly logger?: Logger;

  constructor(options: EngineRunnerOptions) {
    super();
    this.options = {
      runtimePath: options.runtimePath,
      modelPath: options.modelPath,
      startupTimeoutMs: options.startupTimeoutMs ?? 30000,
      requestTimeoutMs: options.requestTimeoutMs ?? 10000,
      shutdownTimeoutMs: options.shutdownTimeoutMs ?? 5000,
    };
    this.logger = options.logger;
  }

  /**
   * Transport connected to the running runtime, if any
   */
  public getTransport(): JsonRpcTransport | null {
    return this.transport;
  }

  public getStatus(): RunnerStatus {
    return this.status;
  }

  public get requestTimeoutMs(): number {
    return this.options.requestTimeoutMs;
  }

  /**
   * Start the engine runtime and wait until it answers `runtime/info`
   */
  public async start(): Promise<RuntimeInfoResponse> {
    if (this.process !== null || this.status === 'starting') {
      throw new Error('Engine runtime is already running or starting');
    }

    this.status = 'starting';
    this.shutdownRequested = false;

    const child = spawn(this.options.runtimePath, ['--model', this.options.modelPath], {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: process.env,
    });
    this.process = child;

    this.logger?.info(
      { pid: child.pid, runtimePath: this.options.runtimePath, modelPath: this.options.modelPath },
      'Engine runtime process spawned'
    );

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout) {
      await this.abortStart(child);
      throw new Error('Engine runtime spawned without stdio pipes');
    }

    const spawnFailure = new Promise<never>((_resolve, reject) => {
      child.once('error', (error) => reject(error));
      child.once('exit', (code) =>
        reject(new Error(`Engine runtime exited during startup (code: ${code ?? 'null'})`))
      );
    });

    child.on('exit', (code) => this.handleExit(code));
    child.on('error', (error) => {
      this.logger?.error({ err: error }, 'Engine runtime process error');
    });

    const transport = new JsonRpcTransport({
      stdin,
      stdout,
      stderr: stderr ?? undefined,
      logger: this.logger,
      defaultTimeout: this.options.requestTimeoutMs,
    });
    this.transport = transport;

    try {
      const raw = await Promise.race([
        transport.request('runtime/info', undefined, {
          timeout: this.options.startupTimeoutMs,
        }),
        spawnFailure,
      ]);
      const info = RuntimeInfoResponseSchema.parse(raw);

      this.status = 'ready';
      this.logger?.info({ runtimeInfo: info }, 'Engine runtime is ready');
      return info;
    } catch (error) {
      this.logger?.error({ err: error }, 'Engine runtime failed to start');
      await this.abortStart(child);
      throw error;
    } finally {
      // The startup watcher rejects on the eventual exit once the runtime is up.
      spawnFailure.catch((error: unknown) => {
        this.logger?.debug({ err: error }, 'Engine runtime startup watcher settled');
      });
    }
  }

  /**
   * Stop the engine runtime; resolves once the process has exited or was killed
   */
  public async stop(): Promise<void> {
    this.shutdownRequested = true;

    const child = this.process;
    if (child === null) {
      return;
    }

    this.logger?.info('Stopping engine runtime...');

    const transport = this.transport;
    transport?.notify('shutdown');

    await new Promise<void>((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        this.logger?.warn('Force killing engine runtime');
        child.kill('SIGKILL');
        resolve();
      }, this.options.shutdownTimeoutMs);

      child.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });
    });

    await transport?.close();
    this.transport = null;
    this.process = null;
    this.status = 'stopped';
  }

  private async abortStart(child: ChildProcess): Promise<void> {
    this.shutdownRequested = true;
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGTERM');
    }
    await this.transport?.close();
    this.transport = null;
    this.process = null;
    this.status = 'stopped';
  }

  private handleExit(code: number | null): void {
    if (this.shutdownRequested) {
      this.emit('exit', code, true);
      return;
    }

    this.logger?.error({ code }, 'Engine runtime exited unexpectedly');
    this.status = 'error';
    this.process = null;
    const transport = this.transport;
    this.transport = null;
    transport?.close().catch((error: unknown) => {
      this.logger?.warn({ err: error }, 'Failed to close engine runtime transport');
    });
    this.emit('exit', code, false);
  }
}

/**
 * Lifecycle Controller
 *
 * Owns the process state machine (starting → serving → draining → stopped)
 * and the ordered shutdown: readiness flips first, the listeners keep
 * serving through the drain interval, then every resource is stopped in
 * turn.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { PoseStore } from '../cache/pose-store.js';
import type { PredictionEngine } from '../engine/prediction-engine.js';
import type { ServiceMetrics } from '../telemetry/otel.js';
import { OVERALL_SERVICE, type HealthRegistry } from '../server/health.js';

export type LifecycleState = 'starting' | 'serving' | 'draining' | 'stopped';

const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  starting: ['serving', 'stopped'],
  serving: ['draining'],
  draining: ['stopped'],
  stopped: [],
};

export class LifecycleError extends Error {
  constructor(
    public readonly from: LifecycleState,
    public readonly to: LifecycleState
  ) {
    super(`invalid lifecycle transition: ${from} -> ${to}`);
    this.name = 'LifecycleError';
  }
}

/**
 * A listener the controller starts and stops.
 */
export interface Listener {
  start(): Promise<unknown>;
  stop(): Promise<void>;
}

export interface LifecycleComponents {
  rpc: Listener;
  http: Listener;
  health: HealthRegistry;
  engine: PredictionEngine;
  metrics?: ServiceMetrics;
  telemetry?: { shutdown(): Promise<void> };
  poseStore?: PoseStore | null;
}

export interface LifecycleOptions {
  /**
   * Name registered with the health service next to the overall status
   */
  serviceName: string;
  /**
   * Delay between flipping readiness and stopping the listeners (ms)
   */
  drainMs: number;
  logger?: Logger;
}

export interface LifecycleEvents {
  stateChange: (to: LifecycleState, from: LifecycleState) => void;
}

export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private state: LifecycleState = 'starting';
  private shutdownPromise: Promise<void> | null = null;
  private engineFailure: string | null = null;
  private readonly components: LifecycleComponents;
  private readonly options: LifecycleOptions;
  private readonly logger?: Logger;

  constructor(components: LifecycleComponents, options: LifecycleOptions) {
    super();
    this.components = components;
    this.options = options;
    this.logger = options.logger;

    components.engine.onFailure?.((reason) => this.handleEngineFailure(reason));
  }

  public getState(): LifecycleState {
    return this.state;
  }

  /**
   * Bind both listeners, then report SERVING.
   *
   * On a bind failure everything already started is torn down and the
   * controller ends in `stopped`.
   */
  public async start(): Promise<void> {
    this.assertTransition('serving');

    try {
      await this.components.rpc.start();
      await this.components.http.start();
    } catch (error) {
      this.logger?.error({ err: error }, 'Startup failed, releasing resources');
      this.transition('stopped');
      await this.stopResources();
      throw error;
    }

    this.transition('serving');
    if (this.engineFailure !== null) {
      this.logger?.error({ reason: this.engineFailure }, 'Engine failed before startup finished, staying NOT_SERVING');
      return;
    }

    this.setReadiness(true);
    this.logger?.info({ serviceName: this.options.serviceName }, 'Service is ready to accept requests');
  }

  /**
   * Flip readiness, drain, then stop everything. Repeated calls return the
   * first call's promise.
   *
   * @throws LifecycleError when the service is not serving
   */
  public beginShutdown(signal = 'manual'): Promise<void> {
    if (this.shutdownPromise) {
      this.logger?.debug({ signal }, 'Shutdown already in progress');
      return this.shutdownPromise;
    }

    this.transition('draining');
    this.logger?.info({ signal, drainMs: this.options.drainMs }, 'Received shutdown signal, draining');

    this.setReadiness(false);

    this.shutdownPromise = this.drainAndStop();
    return this.shutdownPromise;
  }

  /**
   * The listeners stay up; calls fail with FAILED_PRECONDITION until the
   * process is replaced.
   */
  private handleEngineFailure(reason: string): void {
    if (this.engineFailure !== null || this.state === 'draining' || this.state === 'stopped') {
      this.logger?.debug({ reason, state: this.state }, 'Ignoring engine failure');
      return;
    }

    this.engineFailure = reason;
    this.logger?.error({ reason }, 'Engine failed, marking service NOT_SERVING');
    if (this.state === 'serving') {
      this.setReadiness(false);
    }
  }

  private setReadiness(serving: boolean): void {
    const { health, metrics } = this.components;
    const status = serving ? 'SERVING' : 'NOT_SERVING';
    health.setStatus(OVERALL_SERVICE, status);
    health.setStatus(this.options.serviceName, status);
    metrics?.setHealthy(serving);
  }

  private async drainAndStop(): Promise<void> {
    if (this.options.drainMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.options.drainMs));
    }

    this.components.health.closeWatchers();
    await this.stopResources();

    this.transition('stopped');
    this.logger?.info('Server shutdown complete');
  }

  /**
   * Each step runs even when the previous one failed.
   */
  private async stopResources(): Promise<void> {
    const { rpc, http, telemetry, engine, poseStore } = this.components;

    await this.runStep('rpc', () => rpc.stop());
    await this.runStep('http', () => http.stop());
    if (telemetry) {
      await this.runStep('telemetry', () => telemetry.shutdown());
    }
    await this.runStep('engine', () => engine.release());
    if (poseStore) {
      await this.runStep('pose-store', () => poseStore.close());
    }
  }

  private async runStep(step: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
      this.logger?.debug({ step }, 'Shutdown step complete');
    } catch (error) {
      this.logger?.error({ err: error, step }, 'Shutdown step failed');
    }
  }

  private assertTransition(to: LifecycleState): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new LifecycleError(this.state, to);
    }
  }

  private transition(to: LifecycleState): void {
    this.assertTransition(to);
    const from = this.state;
    this.state = to;
    this.emit('stateChange', to, from);
  }
}

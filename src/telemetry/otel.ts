/**
 * OpenTelemetry infrastructure for policy-serving.
 *
 * Builds the process-wide observability registry: one MeterProvider read by
 * a Prometheus exporter (served by the auxiliary HTTP listener), the service
 * metrics, and an optional tracer for per-call spans.
 *
 * @module telemetry/otel
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Attributes, Histogram, Meter, ObservableGauge, Tracer } from '@opentelemetry/api';
import { MeterProvider, type MetricReader } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  ConsoleSpanExporter,
} from '@opentelemetry/sdk-trace-base';
import type { Logger } from 'pino';

/**
 * Configuration options for the telemetry manager.
 */
export interface TelemetryConfig {
  /**
   * Service name for meters and tracers (default: 'policy-serving').
   */
  serviceName?: string;
  /**
   * Emit one span per RPC to the console exporter (default: false).
   */
  tracingEnabled?: boolean;
  /**
   * Additional metric readers, e.g. an in-memory reader in tests.
   */
  readers?: MetricReader[];
  logger?: Logger;
}

const CALL_LATENCY_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];
const BATCH_SIZE_BUCKETS = [1, 2, 4, 8, 16, 32, 64, 128, 256];
const ENGINE_LATENCY_BUCKETS = [0.0001, 0.0005, 0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1];

/**
 * Metrics emitted by the planner service.
 *
 * Constructed once from the registry's meter and passed by reference to
 * every component that records observations.
 */
export class ServiceMetrics {
  private readonly callLatency: Histogram;
  private readonly batchSize: Histogram;
  private readonly engineLatency: Histogram;
  private readonly healthGauge: ObservableGauge;
  private healthy = false;

  constructor(meter: Meter) {
    this.callLatency = meter.createHistogram('grpc_server_handling_seconds', {
      description:
        'Histogram of response latency (seconds) of gRPC that had been application-level handled by the server.',
      unit: 's',
      advice: { explicitBucketBoundaries: CALL_LATENCY_BUCKETS },
    });
    this.batchSize = meter.createHistogram('inference_batch_size', {
      description: 'Histogram of batch sizes for inference requests.',
      advice: { explicitBucketBoundaries: BATCH_SIZE_BUCKETS },
    });
    this.engineLatency = meter.createHistogram('inference_latency_seconds', {
      description: 'Histogram of inference latency (seconds) excluding gRPC overhead.',
      unit: 's',
      advice: { explicitBucketBoundaries: ENGINE_LATENCY_BUCKETS },
    });
    this.healthGauge = meter.createObservableGauge('health_status', {
      description: 'Health status of the service (1 = healthy, 0 = unhealthy).',
    });
    this.healthGauge.addCallback((result) => {
      result.observe(this.healthy ? 1 : 0);
    });
  }

  public recordCall(method: string, code: string, seconds: number): void {
    const attributes: Attributes = { method, code };
    this.callLatency.record(seconds, attributes);
  }

  public recordBatchSize(size: number): void {
    this.batchSize.record(size);
  }

  public recordEngineLatency(seconds: number): void {
    this.engineLatency.record(seconds);
  }

  public setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  public isHealthy(): boolean {
    return this.healthy;
  }
}

/**
 * OpenTelemetry telemetry manager for policy-serving.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ serviceName: 'policy-serving', logger });
 * telemetry.start();
 *
 * telemetry.metrics.recordBatchSize(8);
 *
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly serviceName: string;
  private readonly tracingEnabled: boolean;
  private readonly extraReaders: MetricReader[];
  private readonly logger?: Logger;

  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private tracerProvider: BasicTracerProvider | null = null;
  private _metrics: ServiceMetrics | null = null;
  private _tracer: Tracer | null = null;

  constructor(config: TelemetryConfig = {}) {
    this.serviceName = config.serviceName || 'policy-serving';
    this.tracingEnabled = config.tracingEnabled ?? false;
    this.extraReaders = config.readers ?? [];
    this.logger = config.logger;
  }

  /**
   * Get the service metrics. Throws if not started.
   */
  public get metrics(): ServiceMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  /**
   * Tracer for per-call spans, or null when tracing is disabled.
   */
  public get tracer(): Tracer | null {
    return this._tracer;
  }

  /**
   * Create the meter provider, Prometheus reader and (optionally) the tracer.
   */
  public start(): void {
    if (this.meterProvider) {
      this.logger?.warn('TelemetryManager already started');
      return;
    }

    // The exporter never binds its own port; /metrics lives on the auxiliary listener.
    const exporter = new PrometheusExporter({ preventServerStart: true });
    this.prometheusExporter = exporter;
    this.meterProvider = new MeterProvider({
      readers: [exporter, ...this.extraReaders],
    });
    this._metrics = new ServiceMetrics(this.meterProvider.getMeter(this.serviceName));

    if (this.tracingEnabled) {
      this.tracerProvider = new BasicTracerProvider({
        spanProcessors: [new BatchSpanProcessor(new ConsoleSpanExporter())],
      });
      this._tracer = this.tracerProvider.getTracer(this.serviceName);
    }

    this.logger?.info(
      { serviceName: this.serviceName, tracingEnabled: this.tracingEnabled },
      'OpenTelemetry metrics started'
    );
  }

  /**
   * Serve the Prometheus text exposition for the current metrics.
   */
  public handleScrape(request: IncomingMessage, response: ServerResponse): void {
    if (!this.prometheusExporter) {
      response.statusCode = 503;
      response.end('Telemetry not started');
      return;
    }
    this.prometheusExporter.getMetricsRequestHandler(request, response);
  }

  /**
   * Flush and close metrics and tracing export.
   */
  public async shutdown(): Promise<void> {
    if (!this.meterProvider) {
      return;
    }

    const meterProvider = this.meterProvider;
    const tracerProvider = this.tracerProvider;
    this.meterProvider = null;
    this.prometheusExporter = null;
    this.tracerProvider = null;
    this._tracer = null;

    try {
      // Also shuts down every registered reader, the Prometheus exporter included.
      await meterProvider.shutdown();
      await tracerProvider?.shutdown();
      this.logger?.info('OpenTelemetry metrics shut down');
    } catch (error) {
      this.logger?.error({ err: error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  public isStarted(): boolean {
    return this.meterProvider !== null;
  }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { status } from '@grpc/grpc-js';
import { BatchPipeline } from '../../../src/core/batch-pipeline.js';
import { MockEngine } from '../../../src/engine/mock-engine.js';
import { PLAN_METHOD, BATCH_PLAN_METHOD, PlannerService } from '../../../src/server/planner-service.js';
import { TelemetryManager } from '../../../src/telemetry/otel.js';
import type { BatchPlanRequest, BatchPlanResponse, PlanRequest, PlanResponse } from '../../../src/types/planner.js';
import { createUnaryCall, invokeUnary } from '../../helpers/grpc-call.js';
import { createSilentLogger } from '../../helpers/logger.js';
import { TestMetricReader } from '../../helpers/metrics.js';

const logger = createSilentLogger();
const DEFAULT_ACTION = Array.from(Float32Array.of(0.1, 0.2, 0.3));

function planRequest(robotId: string, data: number[] = [0.5, 0.5, 0.5, 0.5]): PlanRequest {
  return { robotId, obs: { data, channels: 1, height: 2, width: 2 } };
}

describe('PlannerService', () => {
  let engine: MockEngine;
  let service: PlannerService;
  let telemetry: TelemetryManager;
  let reader: TestMetricReader;

  beforeEach(() => {
    reader = new TestMetricReader();
    telemetry = new TelemetryManager({ readers: [reader] });
    telemetry.start();
    engine = new MockEngine();
    service = new PlannerService(new BatchPipeline({ engine, metrics: telemetry.metrics, logger }));
  });

  afterEach(async () => {
    await telemetry.shutdown();
  });

  describe('plan', () => {
    it('runs a batch of one', async () => {
      const response = await service.plan(planRequest('7'), { requestId: 'r-1', method: PLAN_METHOD });

      expect(response).toEqual({ action: DEFAULT_ACTION, safe: true });
      expect(engine.callCount).toBe(1);
    });
  });

  describe('batchPlan', () => {
    it('returns the responses in request order', async () => {
      engine.setAction([1, 2]);

      const response = await service.batchPlan(
        { requests: [planRequest('1'), planRequest('2'), planRequest('3')] },
        { requestId: 'r-2', method: BATCH_PLAN_METHOD }
      );

      expect(response.responses).toHaveLength(3);
      expect(response.responses.every((r) => r.action.join(',') === '1,2' && r.safe)).toBe(true);
      expect(engine.callCount).toBe(1);
    });
  });

  describe('implementation', () => {
    it('answers Plan over the unary handler', async () => {
      const { Plan } = service.implementation({ metrics: telemetry.metrics, logger });
      const { call } = createUnaryCall<PlanRequest, PlanResponse>(planRequest('42'));

      const outcome = await invokeUnary(Plan, call);

      expect(outcome).toEqual({ error: null, value: { action: DEFAULT_ACTION, safe: true } });
    });

    it('maps validation failures to INVALID_ARGUMENT', async () => {
      const { BatchPlan } = service.implementation();
      const { call } = createUnaryCall<BatchPlanRequest, BatchPlanResponse>({
        requests: [planRequest('1'), { robotId: '2', obs: null }],
      });

      const outcome = await invokeUnary(BatchPlan, call);

      expect(outcome.error).toEqual({ code: status.INVALID_ARGUMENT, details: 'request 1 has nil observation' });
      expect(outcome.value).toBeUndefined();
      expect(engine.callCount).toBe(0);
    });

    it('maps an empty batch to INVALID_ARGUMENT', async () => {
      const { BatchPlan } = service.implementation();
      const { call } = createUnaryCall<BatchPlanRequest, BatchPlanResponse>({ requests: [] });

      const outcome = await invokeUnary(BatchPlan, call);

      expect(outcome.error).toEqual({ code: status.INVALID_ARGUMENT, details: 'batch request cannot be nil or empty' });
    });

    it('maps a released engine to FAILED_PRECONDITION', async () => {
      await engine.release();
      const { Plan } = service.implementation();

      const outcome = await invokeUnary(Plan, createUnaryCall<PlanRequest, PlanResponse>(planRequest('1')).call);

      expect(outcome.error).toEqual({ code: status.FAILED_PRECONDITION, details: 'inference engine not initialized' });
    });

    it('maps engine failures to INTERNAL', async () => {
      engine.setError();
      const { Plan } = service.implementation();

      const outcome = await invokeUnary(Plan, createUnaryCall<PlanRequest, PlanResponse>(planRequest('1')).call);

      expect(outcome.error).toEqual({
        code: status.INTERNAL,
        details: 'inference execution failed: mock inference error',
      });
    });

    it('records one call sample per RPC labelled with its outcome', async () => {
      const { Plan } = service.implementation({ metrics: telemetry.metrics });

      await invokeUnary(Plan, createUnaryCall<PlanRequest, PlanResponse>(planRequest('1')).call);
      await invokeUnary(Plan, createUnaryCall<PlanRequest, PlanResponse>({ robotId: '2', obs: null }).call);

      const points = await reader.histogram('grpc_server_handling_seconds');
      const counts = Object.fromEntries(points.map((p) => [String(p.attributes.code), p.count]));
      expect(counts).toEqual({ OK: 1, INVALID_ARGUMENT: 1 });
      expect(points.every((p) => p.attributes.method === PLAN_METHOD)).toBe(true);
    });
  });
});

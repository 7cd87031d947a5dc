/**
 * PathPlanner gRPC service.
 *
 * Plan is a batch of one through the same pipeline as BatchPlan. Every
 * error leaving a handler is a PlannerError mapped onto its gRPC status.
 */

import type { sendUnaryData } from '@grpc/grpc-js';
import { internalError, toPlannerError } from '../api/errors.js';
import type { BatchPipeline } from '../core/batch-pipeline.js';
import type { BatchPlanRequest, BatchPlanResponse, PlanRequest, PlanResponse } from '../types/planner.js';
import {
  withRequestContext,
  type RequestContext,
  type RequestContextDeps,
  type UnaryHandler,
} from './request-context.js';

export const PLANNER_SERVICE_NAME = 'planner.PathPlanner';
export const PLAN_METHOD = `/${PLANNER_SERVICE_NAME}/Plan`;
export const BATCH_PLAN_METHOD = `/${PLANNER_SERVICE_NAME}/BatchPlan`;

export type PlannerImplementation = {
  Plan: UnaryHandler<PlanRequest, PlanResponse>;
  BatchPlan: UnaryHandler<BatchPlanRequest, BatchPlanResponse>;
};

export class PlannerService {
  constructor(private readonly pipeline: BatchPipeline) {}

  public async plan(request: PlanRequest, context: RequestContext): Promise<PlanResponse> {
    const { responses } = await this.pipeline.run({ requests: [request] }, context);
    const first = responses[0];
    if (first === undefined) {
      throw internalError('no response from batch plan');
    }
    return first;
  }

  public async batchPlan(request: BatchPlanRequest, context: RequestContext): Promise<BatchPlanResponse> {
    return this.pipeline.run(request, context);
  }

  /**
   * Handlers keyed by RPC name, wrapped with request context propagation.
   */
  public implementation(deps: RequestContextDeps = {}): PlannerImplementation {
    return {
      Plan: withRequestContext<PlanRequest, PlanResponse>(
        PLAN_METHOD,
        (call, callback, context) => this.respond(this.plan(call.request, context), callback),
        deps
      ),
      BatchPlan: withRequestContext<BatchPlanRequest, BatchPlanResponse>(
        BATCH_PLAN_METHOD,
        (call, callback, context) => this.respond(this.batchPlan(call.request, context), callback),
        deps
      ),
    };
  }

  private respond<Res>(result: Promise<Res>, callback: sendUnaryData<Res>): void {
    void result.then(
      (value) => callback(null, value),
      (error: unknown) => {
        const plannerError = toPlannerError(error);
        callback({ code: plannerError.toStatus(), details: plannerError.message });
      }
    );
  }
}

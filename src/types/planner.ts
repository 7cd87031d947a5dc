/**
 * Planner domain types
 *
 * Shapes of the Plan / BatchPlan RPCs after decoding from the wire.
 * Robot identifiers are uint64 on the wire and stay decimal strings here.
 */

/**
 * Fixed-shape observation fed to the prediction engine.
 * `data.length` must equal `channels * height * width`.
 */
export interface Observation {
  data: ArrayLike<number>;
  channels: number;
  height: number;
  width: number;
}

export interface PlanRequest {
  robotId: string;
  obs: Observation | null | undefined;
}

export interface BatchPlanRequest {
  requests: Array<PlanRequest | null | undefined>;
}

export interface PlanResponse {
  action: number[];
  safe: boolean;
}

export interface BatchPlanResponse {
  responses: PlanResponse[];
}

/**
 * Shared (channels, height, width) of every observation in one batch.
 */
export interface ObservationDims {
  channels: number;
  height: number;
  width: number;
}

export function dimsSize(dims: ObservationDims): number {
  return dims.channels * dims.height * dims.width;
}

export function formatDims(dims: ObservationDims): string {
  return `(${dims.channels},${dims.height},${dims.width})`;
}

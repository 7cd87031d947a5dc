/**
 * JSON-RPC 2.0 Serialization Schemas
 *
 * Validates every message exchanged with the engine runtime using Zod.
 * JSON-RPC 2.0: https://www.jsonrpc.org/specification
 */

import { z } from 'zod';

/**
 * JSON-RPC 2.0 Request
 */
export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
  id: z.union([z.string(), z.number()]),
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

/**
 * JSON-RPC 2.0 Response (Success)
 */
export const JsonRpcSuccessSchema = z.object({
  jsonrpc: z.literal('2.0'),
  result: z.unknown(),
  id: z.union([z.string(), z.number(), z.null()]),
});

export type JsonRpcSuccess = z.infer<typeof JsonRpcSuccessSchema>;

/**
 * JSON-RPC 2.0 Error Object
 */
export const JsonRpcErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type JsonRpcErrorObject = z.infer<typeof JsonRpcErrorObjectSchema>;

/**
 * JSON-RPC 2.0 Response (Error)
 */
export const JsonRpcErrorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  error: JsonRpcErrorObjectSchema,
  id: z.union([z.string(), z.number(), z.null()]),
});

export type JsonRpcErrorResponse = z.infer<typeof JsonRpcErrorResponseSchema>;

/**
 * JSON-RPC 2.0 Notification (no id)
 */
export const JsonRpcNotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
});

export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema>;

/**
 * Messages the runtime may send back: responses and notifications.
 * Error responses are tried first so an `error` member is never read as a result.
 */
export const JsonRpcInboundSchema = z.union([
  JsonRpcErrorResponseSchema.strict(),
  JsonRpcSuccessSchema.strict(),
  JsonRpcNotificationSchema.strict(),
]);

export type JsonRpcInbound = z.infer<typeof JsonRpcInboundSchema>;

/**
 * JSON-RPC 2.0 Error Codes
 *
 * Standard JSON-RPC codes: -32700 to -32600
 * Engine runtime codes: -32001 to -32099
 */
export enum JsonRpcErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,
  ServerError = -32000,

  ModelLoadError = -32001,
  InferenceError = -32002,
  ShapeError = -32003,
  RuntimeError = -32099,
}

/**
 * Runtime method payloads
 */

// runtime/info
export const RuntimeInfoResponseSchema = z.object({
  version: z.string(),
  action_dim: z.number().int().positive().optional(),
});

export type RuntimeInfoResponse = z.infer<typeof RuntimeInfoResponseSchema>;

// predict
export const PredictParamsSchema = z.object({
  shape: z.tuple([
    z.number().int().positive(),
    z.number().int().positive(),
    z.number().int().positive(),
    z.number().int().positive(),
  ]),
  data: z.array(z.number()),
});

export type PredictParams = z.infer<typeof PredictParamsSchema>;

export const PredictResultSchema = z.object({
  actions: z.array(z.number()),
});

export type PredictResult = z.infer<typeof PredictResultSchema>;

/**
 * Line codec used by the transport.
 */
export interface Codec {
  encode(value: unknown): Buffer;
  decode(buffer: Buffer): unknown;
}

export const JsonCodec: Codec = {
  encode: (value) => Buffer.from(JSON.stringify(value), 'utf-8'),
  decode: (buffer): unknown => JSON.parse(buffer.toString('utf-8')),
};

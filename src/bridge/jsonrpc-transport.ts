/**
 * JSON-RPC 2.0 Transport Layer
 *
 * Handles communication with the engine runtime via stdio:
 * - Line-delimited JSON framing
 * - Request/response correlation via IDs
 * - Timeout and error handling
 */

import type { Readable, Writable } from 'node:stream';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { lazyLog } from '../utils/logger-helpers.js';
import { createTimeoutError } from '../api/errors.js';
import {
  type Codec,
  type JsonRpcErrorCode,
  type JsonRpcInbound,
  type JsonRpcNotification,
  type JsonRpcRequest,
  JsonCodec,
  JsonRpcInboundSchema,
} from './serializers.js';

export interface RequestOptions {
  timeout?: number;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  method: string;
  timeoutHandle: NodeJS.Timeout;
}

export interface JsonRpcTransportEvents {
  error: (error: Error) => void;
  close: () => void;
}

export interface JsonRpcTransportOptions {
  stdin: Writable;
  stdout: Readable;
  stderr?: Readable;
  codec?: Codec;
  logger?: Logger;
  defaultTimeout?: number; // milliseconds (default: 30000)
  maxPendingRequests?: number; // default: 256
  maxLineBufferSize?: number; // bytes (default: 64MB)
}

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_PENDING = 256;
const DEFAULT_MAX_LINE_BUFFER = 64 * 1024 * 1024;

/**
 * JSON-RPC 2.0 Transport over stdio
 *
 * Manages bidirectional communication with the engine runtime.
 */
export class JsonRpcTransport extends EventEmitter<JsonRpcTransportEvents> {
  private readonly stdin: Writable;
  private readonly stdout: Readable;
  private readonly stderr?: Readable;
  private readonly codec: Codec;
  private readonly logger?: Logger;
  private readonly defaultTimeout: number;
  private readonly maxPendingRequests: number;
  private readonly maxLineBufferSize: number;

  private pending = new Map<string | number, PendingRequest>();
  private nextId = 1;
  private closed = false;

  // Buffer for incomplete JSON lines
  private lineBuffer = '';

  // Write queue to ensure ordered writes
  private writeQueue: Promise<void> = Promise.resolve();

  private readonly stdoutDataHandler = (chunk: string): void => this.handleStdoutData(chunk);
  private readonly stdoutEndHandler = (): void => {
    this.logger?.warn('Engine runtime stdout ended');
    void this.close();
  };
  private readonly stdoutErrorHandler = (err: Error): void => {
    this.logger?.error({ err }, 'Stdout error');
    this.emit('error', err);
  };
  private readonly stderrDataHandler = (chunk: string): void => {
    this.logger?.warn({ stderr: chunk.trim() }, 'Engine runtime stderr');
  };
  private readonly stdinErrorHandler = (err: Error): void => {
    this.logger?.error({ err }, 'Stdin error');
    this.emit('error', err);
  };

  constructor(options: JsonRpcTransportOptions) {
    super();

    this.stdin = options.stdin;
    this.stdout = options.stdout;
    this.stderr = options.stderr;
    this.codec = options.codec ?? JsonCodec;
    this.logger = options.logger;
    this.defaultTimeout = options.defaultTimeout ?? DEFAULT_TIMEOUT_MS;
    this.maxPendingRequests = options.maxPendingRequests ?? DEFAULT_MAX_PENDING;
    this.maxLineBufferSize = options.maxLineBufferSize ?? DEFAULT_MAX_LINE_BUFFER;

    this.setupStreams();
  }

  /**
   * Send a JSON-RPC request and await response
   */
  public async request(method: string, params?: unknown, options?: RequestOptions): Promise<unknown> {
    if (this.closed) {
      throw new Error('Transport is closed');
    }

    if (this.pending.size >= this.maxPendingRequests) {
      this.logger?.error(
        { pending: this.pending.size, limit: this.maxPendingRequests },
        'Pending request limit exceeded'
      );
      throw new Error(
        `Too many pending JSON-RPC requests (${this.pending.size} >= ${this.maxPendingRequests})`
      );
    }

    const id = this.nextId++;
    const timeout = options?.timeout ?? this.defaultTimeout;
    const startTime = Date.now();

    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      method,
      params,
      id,
    };

    return new Promise<unknown>((resolve, reject) => {
      const settle = (): void => {
        this.pending.delete(id);
        clearTimeout(timeoutHandle);
      };

      const timeoutHandle = setTimeout(() => {
        settle();
        reject(createTimeoutError(method, timeout, id.toString(), Date.now() - startTime));
      }, timeout);

      this.pending.set(id, {
        resolve: (value) => {
          settle();
          resolve(value);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
        method,
        timeoutHandle,
      });

      this.write(request).catch((err: unknown) => {
        settle();
        reject(err instanceof Error ? err : new Error(String(err)));
      });

      lazyLog(this.logger, 'debug', () => ({ method, id }), 'Sent JSON-RPC request');
    });
  }

  /**
   * Send a JSON-RPC notification (no response expected)
   */
  public notify(method: string, params?: unknown): void {
    if (this.closed) {
      this.logger?.warn({ method }, 'Attempted to notify on closed transport');
      return;
    }

    const notification: JsonRpcNotification = {
      jsonrpc: '2.0',
      method,
      params,
    };

    this.write(notification).catch((err: unknown) => {
      this.logger?.error({ err, method }, 'Failed to send notification');
      this.emit('error', err instanceof Error ? err : new Error(String(err)));
    });
  }

  /**
   * Close the transport and reject every pending request
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    this.stdout.off('data', this.stdoutDataHandler);
    this.stdout.off('end', this.stdoutEndHandler);
    this.stdout.off('error', this.stdoutErrorHandler);
    this.stderr?.off('data', this.stderrDataHandler);
    this.stdin.off('error', this.stdinErrorHandler);

    const error = new Error('Transport closed');
    for (const pending of [...this.pending.values()]) {
      pending.reject(error);
    }
    this.pending.clear();

    this.emit('close');
  }

  public getPendingCount(): number {
    return this.pending.size;
  }

  private setupStreams(): void {
    this.stdout.setEncoding('utf-8');
    this.stdout.on('data', this.stdoutDataHandler);
    this.stdout.on('end', this.stdoutEndHandler);
    this.stdout.on('error', this.stdoutErrorHandler);

    if (this.stderr) {
      this.stderr.setEncoding('utf-8');
      this.stderr.on('data', this.stderrDataHandler);
    }

    this.stdin.on('error', this.stdinErrorHandler);
  }

  private handleStdoutData(chunk: string): void {
    this.lineBuffer += chunk;

    const bufferSize = Buffer.byteLength(this.lineBuffer, 'utf-8');
    if (bufferSize > this.maxLineBufferSize) {
      const error = new Error(
        `JSON-RPC stdout line buffer exceeded limit (${bufferSize} > ${this.maxLineBufferSize})`
      );
      this.logger?.error({ size: bufferSize, limit: this.maxLineBufferSize }, 'Stdout buffer overflow');
      this.emit('error', error);
      this.lineBuffer = '';
      void this.close();
      return;
    }

    const lines = this.lineBuffer.split('\n');
    this.lineBuffer = lines.pop() ?? '';

    for (const line of lines) {
      if (!line.trim()) {
        continue;
      }

      let decoded: unknown;
      try {
        decoded = this.codec.decode(Buffer.from(line, 'utf-8'));
      } catch (err) {
        this.logger?.error({ err, line }, 'Failed to parse JSON-RPC message');
        this.emit('error', err instanceof Error ? err : new Error(String(err)));
        continue;
      }

      this.handleMessage(decoded);
    }
  }

  private handleMessage(raw: unknown): void {
    const parseResult = JsonRpcInboundSchema.safeParse(raw);
    if (!parseResult.success) {
      this.logger?.error({ raw, issues: parseResult.error.issues }, 'Invalid JSON-RPC message');
      return;
    }

    const message: JsonRpcInbound = parseResult.data;
    if ('id' in message) {
      this.handleResponse(message);
    } else {
      // The runtime has no notifications the service subscribes to.
      lazyLog(this.logger, 'debug', () => ({ method: message.method }), 'Ignoring runtime notification');
    }
  }

  private handleResponse(message: Extract<JsonRpcInbound, { id: unknown }>): void {
    if (message.id === null) {
      this.logger?.warn({ message }, 'Response without valid ID');
      return;
    }

    const pending = this.pending.get(message.id);
    if (!pending) {
      this.logger?.warn({ id: message.id }, 'Received response for unknown request');
      return;
    }

    if ('error' in message) {
      const { code, message: msg, data } = message.error;
      pending.reject(new JsonRpcError(code, msg, data));
      return;
    }

    lazyLog(this.logger, 'debug', () => ({ id: message.id, method: pending.method }), 'JSON-RPC success response');
    pending.resolve(message.result);
  }

  /**
   * Write message to stdin (with queuing for ordering)
   */
  private write(message: JsonRpcRequest | JsonRpcNotification): Promise<void> {
    // A failed write breaks the chain so later messages never overtake it.
    this.writeQueue = this.writeQueue.then(() => {
      if (this.closed) {
        throw new Error('Transport is closed');
      }

      const line = this.codec.encode(message).toString('utf-8') + '\n';

      return new Promise<void>((resolve, reject) => {
        const onError = (err: Error): void => {
          cleanup();
          reject(err);
        };
        const onClose = (): void => {
          cleanup();
          reject(new Error('Stdin closed while waiting for drain'));
        };
        const onDrain = (): void => {
          cleanup();
          resolve();
        };
        const cleanup = (): void => {
          this.stdin.off('drain', onDrain);
          this.stdin.off('error', onError);
          this.stdin.off('close', onClose);
        };

        let flushed: boolean;
        try {
          flushed = this.stdin.write(line, 'utf-8');
        } catch (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
          return;
        }

        if (flushed) {
          resolve();
          return;
        }

        this.logger?.debug('Stdin backpressure detected, waiting for drain');
        this.stdin.once('drain', onDrain);
        this.stdin.once('error', onError);
        this.stdin.once('close', onClose);
      });
    });

    return this.writeQueue;
  }
}

/**
 * JSON-RPC Error
 */
export class JsonRpcError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'JsonRpcError';
  }

  public is(code: JsonRpcErrorCode): boolean {
    return this.code === code;
  }
}

import { PassThrough } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { JsonRpcError, JsonRpcTransport } from '../../../src/bridge/jsonrpc-transport.js';
import { JsonRpcErrorCode } from '../../../src/bridge/serializers.js';
import { createFakeRuntime } from '../../helpers/fake-runtime.js';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('JsonRpcTransport', () => {
  it('resolves a request with the matching result', async () => {
    const runtime = createFakeRuntime((request) => ({ result: { echo: request.method } }));

    await expect(runtime.transport.request('runtime/info')).resolves.toEqual({ echo: 'runtime/info' });
    await runtime.transport.close();
  });

  it('correlates out-of-order responses by id', async () => {
    const runtime = createFakeRuntime(() => null);

    const first = runtime.transport.request('first');
    const second = runtime.transport.request('second');
    await flush();

    const [a, b] = runtime.received;
    expect(a?.method).toBe('first');
    expect(b?.method).toBe('second');

    runtime.stdout.write(`${JSON.stringify({ jsonrpc: '2.0', id: b?.id, result: 'two' })}\n`);
    runtime.stdout.write(`${JSON.stringify({ jsonrpc: '2.0', id: a?.id, result: 'one' })}\n`);

    await expect(first).resolves.toBe('one');
    await expect(second).resolves.toBe('two');
    await runtime.transport.close();
  });

  it('reassembles a response split across chunks', async () => {
    const runtime = createFakeRuntime(() => null);

    const pending = runtime.transport.request('predict');
    await flush();
    const id = runtime.received[0]?.id;
    const line = `${JSON.stringify({ jsonrpc: '2.0', id, result: { actions: [1] } })}\n`;

    runtime.stdout.write(line.slice(0, 10));
    await flush();
    runtime.stdout.write(line.slice(10));

    await expect(pending).resolves.toEqual({ actions: [1] });
    await runtime.transport.close();
  });

  it('rejects with a JsonRpcError carrying the runtime error code', async () => {
    const runtime = createFakeRuntime(() => ({
      error: { code: JsonRpcErrorCode.InferenceError, message: 'forward pass failed', data: { step: 3 } },
    }));

    const error = await runtime.transport.request('predict').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JsonRpcError);
    expect(error).toMatchObject({ code: -32002, message: 'forward pass failed', data: { step: 3 } });
    expect(error instanceof JsonRpcError && error.is(JsonRpcErrorCode.InferenceError)).toBe(true);
    await runtime.transport.close();
  });

  it('times out unanswered requests', async () => {
    const runtime = createFakeRuntime(() => null);

    await expect(runtime.transport.request('slow', undefined, { timeout: 20 })).rejects.toMatchObject({
      name: 'TimeoutError',
      method: 'slow',
      timeout: 20,
    });
    expect(runtime.transport.getPendingCount()).toBe(0);
    await runtime.transport.close();
  });

  it('enforces the pending request limit', async () => {
    const transport = new JsonRpcTransport({
      stdin: new PassThrough(),
      stdout: new PassThrough(),
      maxPendingRequests: 1,
      defaultTimeout: 1000,
    });

    const first = transport.request('first');
    await expect(transport.request('second')).rejects.toThrow(
      'Too many pending JSON-RPC requests (1 >= 1)'
    );

    await transport.close();
    await expect(first).rejects.toThrow('Transport closed');
  });

  it('rejects requests after close', async () => {
    const runtime = createFakeRuntime();
    await runtime.transport.close();

    await expect(runtime.transport.request('predict')).rejects.toThrow('Transport is closed');
  });

  it('ignores notifications from the runtime and keeps answering requests', async () => {
    const runtime = createFakeRuntime((request) => ({ result: request.method }));

    runtime.stdout.write(`${JSON.stringify({ jsonrpc: '2.0', method: 'runtime/log', params: { level: 'info' } })}\n`);
    await flush();

    await expect(runtime.transport.request('runtime/info')).resolves.toBe('runtime/info');
    expect(runtime.transport.getPendingCount()).toBe(0);
    await runtime.transport.close();
  });

  it('writes notifications without an id', async () => {
    const runtime = createFakeRuntime();

    runtime.transport.notify('shutdown');
    await flush();

    expect(runtime.notifications).toEqual([{ method: 'shutdown', params: undefined }]);
    expect(runtime.received).toHaveLength(0);
    await runtime.transport.close();
  });

  it('ignores lines that are not valid JSON-RPC', async () => {
    const runtime = createFakeRuntime(() => null);
    const errors: Error[] = [];
    runtime.transport.on('error', (error) => errors.push(error));

    const pending = runtime.transport.request('predict');
    await flush();
    runtime.stdout.write('not json\n');
    runtime.stdout.write(`${JSON.stringify({ hello: 'world' })}\n`);
    runtime.stdout.write(`${JSON.stringify({ jsonrpc: '2.0', id: runtime.received[0]?.id, result: 7 })}\n`);

    await expect(pending).resolves.toBe(7);
    expect(errors).toHaveLength(1);
    await runtime.transport.close();
  });
});

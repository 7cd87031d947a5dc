import { describe, it, expect } from 'vitest';
import { MockEngine } from '../../../src/engine/mock-engine.js';
import { EngineError } from '../../../src/engine/prediction-engine.js';

const dims = { channels: 1, height: 2, width: 2 };
const obs = (value: number): number[] => [value, value, value, value];

describe('MockEngine', () => {
  it('replicates the default action once per observation', async () => {
    const engine = new MockEngine();

    const output = await engine.predict([obs(1), obs(2)], dims);

    expect(Array.from(output)).toEqual(Array.from(Float32Array.of(0.1, 0.2, 0.3, 0.1, 0.2, 0.3)));
    expect(engine.callCount).toBe(1);
    expect(engine.actionDim).toBe(3);
  });

  it('returns a configured action', async () => {
    const engine = new MockEngine({ action: [1, -1] });

    const output = await engine.predict([obs(0)], dims);

    expect(Array.from(output)).toEqual([1, -1]);
  });

  it('fails with the default message once armed and recovers after clearError', async () => {
    const engine = new MockEngine();
    engine.setError();

    await expect(engine.predict([obs(0)], dims)).rejects.toMatchObject({
      name: 'EngineError',
      kind: 'inference_failed',
      message: 'mock inference error',
    });

    engine.clearError();
    await expect(engine.predict([obs(0)], dims)).resolves.toHaveLength(3);
    expect(engine.callCount).toBe(2);
  });

  it('uses a custom failure message', async () => {
    const engine = new MockEngine();
    engine.setError('gpu on fire');

    await expect(engine.predict([obs(0)], dims)).rejects.toThrow('gpu on fire');
  });

  it('rejects an empty batch', async () => {
    const engine = new MockEngine();

    await expect(engine.predict([], dims)).rejects.toMatchObject({ kind: 'empty_batch' });
  });

  it('rejects an observation of the wrong size', async () => {
    const engine = new MockEngine();

    const error = await engine.predict([obs(0), [1, 2, 3]], dims).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({
      kind: 'shape_mismatch',
      message: 'observation 1 has wrong size: got 3, expected 4',
      details: { index: 1, actual: 3, expected: 4 },
    });
  });

  it('is not ready after release', async () => {
    const engine = new MockEngine();

    await engine.release();

    expect(engine.isReady()).toBe(false);
    await expect(engine.predict([obs(0)], dims)).rejects.toMatchObject({ kind: 'not_ready' });
  });
});

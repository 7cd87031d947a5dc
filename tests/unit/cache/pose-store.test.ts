import { describe, it, expect, beforeEach } from 'vitest';
import { RedisPoseStore, poseKey, type PoseClient } from '../../../src/cache/pose-store.js';

class FakePoseClient implements PoseClient {
  public readonly values = new Map<string, string>();
  public readonly ttls = new Map<string, number>();
  public quitCalls = 0;
  public failWith: Error | null = null;

  async get(key: string): Promise<string | null> {
    this.throwIfFailing();
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<unknown> {
    this.throwIfFailing();
    this.values.set(key, value);
    return 'OK';
  }

  async setEx(key: string, seconds: number, value: string): Promise<unknown> {
    this.throwIfFailing();
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async quit(): Promise<unknown> {
    this.quitCalls += 1;
    return 'OK';
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

describe('poseKey', () => {
  it('namespaces the robot id', () => {
    expect(poseKey('17')).toBe('robot:17:pose');
  });
});

describe('RedisPoseStore', () => {
  let client: FakePoseClient;

  beforeEach(() => {
    client = new FakePoseClient();
  });

  it('stores and reads back a pose', async () => {
    const store = new RedisPoseStore(client);

    await store.setPose('7', '{"x":1,"y":2}');

    expect(client.values.get('robot:7:pose')).toBe('{"x":1,"y":2}');
    expect(client.ttls.size).toBe(0);
    await expect(store.getPose('7')).resolves.toBe('{"x":1,"y":2}');
  });

  it('returns null for a missing pose', async () => {
    await expect(new RedisPoseStore(client).getPose('missing')).resolves.toBeNull();
  });

  it('applies the default TTL and lets a call override it', async () => {
    const store = new RedisPoseStore(client, 60);

    await store.setPose('1', 'a');
    await store.setPose('2', 'b', 5);
    await store.setPose('3', 'c', 0);

    expect(client.ttls.get('robot:1:pose')).toBe(60);
    expect(client.ttls.get('robot:2:pose')).toBe(5);
    expect(client.ttls.has('robot:3:pose')).toBe(false);
    expect(client.values.get('robot:3:pose')).toBe('c');
  });

  it('wraps client failures with the robot id', async () => {
    const store = new RedisPoseStore(client);
    client.failWith = new Error('connection reset');

    await expect(store.setPose('9', 'x')).rejects.toThrow('failed to set pose for robot 9: connection reset');
    await expect(store.getPose('9')).rejects.toThrow('failed to get pose for robot 9: connection reset');
  });

  it('quits the client once', async () => {
    const store = new RedisPoseStore(client);

    await store.close();
    await store.close();

    expect(client.quitCalls).toBe(1);
  });
});

/**
 * Pose Store
 *
 * Redis-backed key-value store for out-of-band robot pose caching.
 * Never on the inference critical path: callers log its failures as
 * warnings and carry on.
 */

import { createClient } from 'redis';
import type { Logger } from 'pino';

/**
 * Subset of the Redis client the pose store relies on.
 */
export interface PoseClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setEx(key: string, seconds: number, value: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

export interface PoseStore {
  setPose(robotId: string, data: string, ttlSeconds?: number): Promise<void>;
  /**
   * @returns the stored pose, or null when the key does not exist
   */
  getPose(robotId: string): Promise<string | null>;
  close(): Promise<void>;
}

const MAX_RECONNECT_ATTEMPTS = 3;

export function poseKey(robotId: string): string {
  return `robot:${robotId}:pose`;
}

export class RedisPoseStore implements PoseStore {
  private closed = false;

  constructor(
    private readonly client: PoseClient,
    private readonly defaultTtlSeconds = 0
  ) {}

  public async setPose(robotId: string, data: string, ttlSeconds = this.defaultTtlSeconds): Promise<void> {
    const key = poseKey(robotId);
    try {
      if (ttlSeconds > 0) {
        await this.client.setEx(key, ttlSeconds, data);
      } else {
        await this.client.set(key, data);
      }
    } catch (error) {
      throw new Error(`failed to set pose for robot ${robotId}: ${describe(error)}`);
    }
  }

  public async getPose(robotId: string): Promise<string | null> {
    try {
      return await this.client.get(poseKey(robotId));
    } catch (error) {
      throw new Error(`failed to get pose for robot ${robotId}: ${describe(error)}`);
    }
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.client.quit();
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Connect to Redis and verify the connection with PING.
 */
export async function connectPoseStore(
  url: string,
  options: { ttlSeconds?: number; logger?: Logger } = {}
): Promise<RedisPoseStore> {
  const client = createClient({
    url,
    socket: {
      // Give up after a few attempts so an unreachable server fails startup instead of blocking it.
      reconnectStrategy: (retries: number) =>
        retries >= MAX_RECONNECT_ATTEMPTS ? new Error(`gave up after ${retries} attempts`) : Math.min(retries * 100, 500),
    },
  });
  client.on('error', (error: unknown) => {
    options.logger?.warn({ err: error }, 'Redis client error');
  });

  try {
    await client.connect();
    await client.ping();
  } catch (error) {
    await client.disconnect().catch((disconnectError: unknown) => {
      options.logger?.debug({ err: disconnectError }, 'Redis disconnect after failed connect');
    });
    throw new Error(`failed to connect to Redis at ${url}: ${describe(error)}`);
  }

  options.logger?.info({ url }, 'Redis pose store connected');
  return new RedisPoseStore(client, options.ttlSeconds ?? 0);
}

import { Redis } from "ioredis";

import type { SetStore } from "../setStore.js";
import { silentLogger, type Logger } from "../../logger.js";

export interface RedisSetStoreOptions {
  url: string;
  /** per-command bound, in milliseconds */
  commandTimeoutMs?: number;
  logger?: Logger;
}

const DELETE_BATCH = 500;

/**
 * SetStore backed by a Redis server through ioredis.
 *
 * One client is shared by every caller. ioredis pipelines concurrent commands over
 * its connection and reconnects on its own, so a slow server delays requests
 * instead of piling up sockets.
 */
export class RedisSetStore implements SetStore {
  private readonly client: Redis;

  constructor(opts: RedisSetStoreOptions) {
    this.client = new Redis(opts.url, {
      lazyConnect: true,
      commandTimeout: opts.commandTimeoutMs ?? 5000,
      maxRetriesPerRequest: 1,
    });

    // connection errors surface here between commands; commands still reject on their own
    const logger = (opts.logger ?? silentLogger).child({ component: "redis" });
    this.client.on("error", (e: Error) => logger.warn("redis connection error", { error: e.message }));
  }

  async ping(): Promise<void> {
    if (this.client.status === "wait") await this.client.connect();
    await this.client.ping();
  }

  async get(key: string): Promise<string | undefined> {
    return (await this.client.get(key)) ?? undefined;
  }

  async set(key: string, value: string): Promise<void> {
    await this.client.set(key, value);
  }

  async hashSet(key: string, fields: Record<string, string>): Promise<void> {
    await this.client.hset(key, fields);
  }

  async hashGetAll(key: string): Promise<Record<string, string> | undefined> {
    const hash = await this.client.hgetall(key);
    // HGETALL answers an empty object for a missing key
    return Object.keys(hash).length ? hash : undefined;
  }

  async setAdd(key: string, member: string): Promise<void> {
    await this.client.sadd(key, member);
  }

  async setMembers(key: string): Promise<string[]> {
    return this.client.smembers(key);
  }

  async setSize(key: string): Promise<number> {
    return this.client.scard(key);
  }

  async delete(keys: string[]): Promise<void> {
    for (let i = 0; i < keys.length; i += DELETE_BATCH) {
      const batch = keys.slice(i, i + DELETE_BATCH);
      if (batch.length) await this.client.del(...batch);
    }
  }

  async sizeBytes(): Promise<number> {
    const info = await this.client.info("memory");
    const match = /^used_memory:(\d+)/m.exec(info);
    return match?.[1] ? Number(match[1]) : 0;
  }

  async close(): Promise<void> {
    if (this.client.status === "wait" || this.client.status === "end") {
      this.client.disconnect();
      return;
    }
    await this.client.quit();
  }
}

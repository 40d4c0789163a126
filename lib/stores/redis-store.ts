import { Redis } from "ioredis";
import type { RedisOptions } from "ioredis";
import { z } from "zod";
import { ConfigurationError } from "../errors.ts";
import { consoleLogger } from "../logger.ts";
import type { Logger } from "../logger.ts";
import type { KVStore } from "../types.ts";

export const DEFAULT_REDIS_URL = "redis://localhost:6379/0";

/**
 * The ioredis commands the store issues
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  mget(keys: string[]): Promise<(string | null)[]>;
  mset(entries: Record<string, string>): Promise<unknown>;
  del(keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  scanStream(options: { match: string; count?: number }): AsyncIterable<
    string[]
  >;
  incr(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

export interface RedisConnectOptions {
  /** `redis://` or `rediss://` URL */
  url?: string;
  /** ioredis options, used when no url is given */
  redis?: RedisOptions;
  logger?: Logger;
}

const redisUrlSchema = z.string().url().refine(
  (url) => url.startsWith("redis://") || url.startsWith("rediss://"),
  "Expected a redis:// or rediss:// URL",
);

const SCAN_BATCH = 100;

/**
 * KVStore backed by Redis through ioredis
 */
export class RedisStore implements KVStore {
  constructor(private readonly client: RedisClientLike) {}

  /**
   * Open a connection and check it once. Nothing is retried: a server that
   * can not be reached is a ConfigurationError.
   */
  static async connect(options: RedisConnectOptions = {}): Promise<RedisStore> {
    const logger = options.logger ?? consoleLogger;
    const connection: RedisOptions = {
      ...options.redis,
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
    };

    let client: Redis;
    if (options.url) {
      const parsed = redisUrlSchema.safeParse(options.url);
      if (!parsed.success) {
        throw new ConfigurationError(
          parsed.error.issues[0]?.message ?? "invalid URL",
          "redisUrl",
        );
      }
      client = new Redis(parsed.data, connection);
    } else {
      if (!options.redis) {
        logger.warn?.(
          `no store or Redis connection given, using ${DEFAULT_REDIS_URL}`,
        );
      }
      client = options.redis
        ? new Redis(connection)
        : new Redis(DEFAULT_REDIS_URL, connection);
    }

    try {
      await client.connect();
    } catch (error) {
      client.disconnect();
      throw new ConfigurationError(
        `unable to connect to Redis: ${
          error instanceof Error ? error.message : String(error)
        }`,
        "redis",
      );
    }
    return new RedisStore(client);
  }

  async get(key: string): Promise<string | null> {
    return await this.client.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.client.set(key, value);
  }

  async multiGet(keys: string[]): Promise<(string | null)[]> {
    if (keys.length === 0) {
      return [];
    }
    return await this.client.mget(keys);
  }

  async multiSet(entries: Record<string, string>): Promise<void> {
    if (Object.keys(entries).length === 0) {
      return;
    }
    await this.client.mset(entries);
  }

  async delete(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return await this.client.del(keys);
  }

  async listKeys(pattern: string): Promise<string[]> {
    return await this.client.keys(pattern);
  }

  /**
   * SCAN may report a key more than once; each key is yielded once
   */
  async *scanKeys(pattern: string): AsyncIterable<string> {
    const seen = new Set<string>();
    const stream = this.client.scanStream({
      match: pattern,
      count: SCAN_BATCH,
    });
    for await (const batch of stream) {
      for (const key of batch) {
        if (!seen.has(key)) {
          seen.add(key);
          yield key;
        }
      }
    }
  }

  async increment(key: string): Promise<number> {
    return await this.client.incr(key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

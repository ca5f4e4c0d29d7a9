import type { SessionCache } from "@sessionbag/core";
import {
  RedisClientManager,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  normalizeTtl,
  setWithTtl,
} from "./internal/redisClient";
import { toRedisCacheError, type RedisOperation } from "./internal/redisErrors";

/**
 * Redis-backed implementation of the SessionBag `SessionCache` contract.
 *
 * Keys arrive already prefixed by SessionBag; values are stored verbatim.
 */
export class RedisSessionCache implements SessionCache {
  private readonly clientManager: RedisClientManager;

  constructor(connection: RedisConnectionInput) {
    this.clientManager = new RedisClientManager(connection);
  }

  async get(key: string): Promise<string | null> {
    return this.withClient(key, "get", (client) => client.get(key));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const ttl = normalizeTtl(ttlSeconds);
    await this.withClient(key, "set", (client) => setWithTtl(client, key, value, ttl));
  }

  async delete(key: string): Promise<void> {
    await this.withClient(key, "delete", (client) => client.del(key));
  }

  async close(): Promise<void> {
    await this.clientManager.close();
  }

  private async withClient<T>(
    key: string,
    operation: RedisOperation,
    fn: (client: RedisClientLike) => Promise<T>,
  ): Promise<T> {
    let client: RedisClientLike;
    try {
      client = await this.clientManager.getClient();
    } catch (error) {
      throw toRedisCacheError(error, key, "connect");
    }

    try {
      return await fn(client);
    } catch (error) {
      throw toRedisCacheError(error, key, operation);
    }
  }
}

export type { RedisClientLike, RedisConnectionInput, RedisConnectionParams };

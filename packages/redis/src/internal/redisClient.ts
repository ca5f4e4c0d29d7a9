import { SessionBagError } from "@sessionbag/core";

/**
 * Subset of the node-redis / ioredis client surface the cache relies on.
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(...args: unknown[]): Promise<unknown>;
  del(key: string): Promise<number | unknown>;
  setEx?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  setex?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  connect?(): Promise<unknown>;
  quit?(): Promise<unknown>;
  disconnect?(): Promise<unknown>;
  isOpen?: boolean;
  status?: string;
}

export type RedisConnectionParams = {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: number;
  tls?: boolean;
  lazyConnect?: boolean;
  redisOptions?: Record<string, unknown>;
};

export type RedisClientWrapper = {
  client: RedisClientLike;
  manageClient?: boolean;
  lazyConnect?: boolean;
};

export type RedisConnectionInput = RedisClientLike | RedisClientWrapper | RedisConnectionParams;

type CreateClient = (options?: Record<string, unknown>) => RedisClientLike;

/**
 * Resolves a {@link RedisConnectionInput} to a client. Params produce a client
 * owned by the cache, created through `redis.createClient` on first use and
 * quit on {@link close}; injected clients are only closed when `manageClient`
 * says so.
 */
export class RedisClientManager {
  private readonly ownClient: boolean;
  private readonly lazyConnect: boolean;
  private client: RedisClientLike | null = null;
  private clientInitPromise: Promise<RedisClientLike> | null = null;

  constructor(private readonly connectionInput: RedisConnectionInput) {
    if (isRedisClientLike(connectionInput)) {
      this.ownClient = false;
      this.lazyConnect = false;
      this.client = connectionInput;
    } else if (isClientWrapper(connectionInput)) {
      this.ownClient = connectionInput.manageClient ?? false;
      this.lazyConnect = connectionInput.lazyConnect ?? false;
      this.client = connectionInput.client;
    } else {
      this.ownClient = true;
      this.lazyConnect = connectionInput.lazyConnect ?? false;
    }
  }

  async getClient(): Promise<RedisClientLike> {
    if (this.client) {
      await this.connect(this.client);
      return this.client;
    }

    this.clientInitPromise ??= this.createOwnedClient();
    this.client = await this.clientInitPromise;
    return this.client;
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!this.ownClient || !client) return;

    if (client.quit) {
      await client.quit();
    } else if (client.disconnect) {
      await client.disconnect();
    }
  }

  private async createOwnedClient(): Promise<RedisClientLike> {
    const connection = this.connectionInput;
    if (isRedisClientLike(connection) || isClientWrapper(connection)) {
      throw new SessionBagError("INTERNAL_ERROR", "Redis client was provided and must not be recreated.");
    }

    const redisModule = await import("redis");
    const createClientFn = (redisModule as unknown as { createClient?: CreateClient }).createClient;
    if (!createClientFn) {
      throw new SessionBagError("INTERNAL_ERROR", "redis.createClient is not available. Ensure 'redis' package is installed.");
    }

    const client = createClientFn(toCreateClientOptions(connection));
    await this.connect(client);
    return client;
  }

  private async connect(client: RedisClientLike): Promise<void> {
    if (this.lazyConnect || isClientOpen(client)) return;
    await client.connect?.();
  }
}

/**
 * Validates a ttl for Redis. Zero means "store without expiry".
 */
export function normalizeTtl(ttlSeconds: number): number {
  const ttl = Math.floor(ttlSeconds);
  if (!Number.isFinite(ttl) || ttl < 0) {
    throw new SessionBagError("INVALID_OPTIONS", "ttlSeconds must be a non-negative integer.", undefined, {
      ttlSeconds,
    });
  }
  return ttl;
}

export async function setWithTtl(
  client: RedisClientLike,
  key: string,
  value: string,
  ttlSeconds: number,
): Promise<void> {
  if (ttlSeconds === 0) {
    await client.set(key, value);
    return;
  }

  if (typeof client.setEx === "function") {
    await client.setEx(key, ttlSeconds, value);
    return;
  }

  if (typeof client.setex === "function") {
    await client.setex(key, ttlSeconds, value);
    return;
  }

  await client.set(key, value, "EX", ttlSeconds);
}

export function isRedisClientLike(value: unknown): value is RedisClientLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  return (
    "get" in value &&
    typeof value.get === "function" &&
    "set" in value &&
    typeof value.set === "function" &&
    "del" in value &&
    typeof value.del === "function"
  );
}

export function isClientWrapper(value: unknown): value is RedisClientWrapper {
  if (!value || typeof value !== "object" || !("client" in value)) {
    return false;
  }

  return isRedisClientLike(value.client);
}

/**
 * Maps connection params onto `createClient` options. Explicit params win over
 * `redisOptions`; `socket` settings are merged.
 */
function toCreateClientOptions(connection: RedisConnectionParams): Record<string, unknown> {
  const { url, host, port, tls, username, password, database, redisOptions = {} } = connection;
  const options: Record<string, unknown> = { ...redisOptions };

  const socket: Record<string, unknown> = {
    ...(host ? { host } : {}),
    ...(port !== undefined ? { port } : {}),
    ...(tls ? { tls: true } : {}),
  };
  if (Object.keys(socket).length > 0) {
    const base = redisOptions.socket;
    options.socket = { ...(typeof base === "object" && base !== null ? base : {}), ...socket };
  }

  if (url) options.url = url;
  if (username) options.username = username;
  if (password) options.password = password;
  if (database !== undefined) options.database = database;
  return options;
}

// node-redis exposes `isOpen`; ioredis a `status` string.
function isClientOpen(client: RedisClientLike): boolean {
  if (client.isOpen === true) return true;
  return client.status === "ready" || client.status === "connect" || client.status === "connecting";
}

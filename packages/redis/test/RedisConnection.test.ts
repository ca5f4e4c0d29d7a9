import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { RedisSessionCache } from "../src";

interface OwnedClient {
  options: Record<string, unknown>;
  isOpen: boolean;
  store: Map<string, string>;
  connect: Mock<() => Promise<void>>;
  quit: Mock<() => Promise<void>>;
  get(key: string): Promise<string | null>;
  set(...args: unknown[]): Promise<unknown>;
  setEx(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

const redis = vi.hoisted(() => {
  const created: OwnedClient[] = [];
  let connectError: Error | null = null;

  const createClient = vi.fn((options: Record<string, unknown>): OwnedClient => {
    const store = new Map<string, string>();
    const client: OwnedClient = {
      options,
      isOpen: false,
      store,
      connect: vi.fn(async () => {
        if (connectError) throw connectError;
        client.isOpen = true;
      }),
      quit: vi.fn(async () => {
        client.isOpen = false;
      }),
      async get(key: string) {
        return store.get(key) ?? null;
      },
      async set(...args: unknown[]) {
        store.set(String(args[0]), String(args[1]));
        return "OK";
      },
      async setEx(key: string, _ttlSeconds: number, value: string) {
        store.set(key, value);
        return "OK";
      },
      async del(key: string) {
        return store.delete(key) ? 1 : 0;
      },
    };
    created.push(client);
    return client;
  });

  return {
    created,
    createClient,
    failConnectWith(error: Error | null) {
      connectError = error;
    },
  };
});

vi.mock("redis", () => ({ createClient: redis.createClient }));

function onlyClient(): OwnedClient {
  expect(redis.created).toHaveLength(1);
  const [client] = redis.created;
  if (!client) throw new Error("no client created");
  return client;
}

describe("RedisSessionCache with connection params", () => {
  beforeEach(() => {
    redis.created.length = 0;
    redis.failConnectWith(null);
  });

  it("creates_a_client_from_params_on_first_use", async () => {
    const cache = new RedisSessionCache({
      url: "redis://cache.test:6379",
      host: "cache.test",
      port: 6380,
      tls: true,
      username: "app",
      password: "test-secret",
      database: 2,
      redisOptions: { name: "sessions", socket: { connectTimeout: 500 } },
    });

    expect(redis.createClient).not.toHaveBeenCalled();

    await cache.set("sess:a", '{"visits":1}', 60);

    expect(redis.createClient).toHaveBeenCalledTimes(1);
    expect(redis.createClient).toHaveBeenCalledWith({
      name: "sessions",
      url: "redis://cache.test:6379",
      socket: { connectTimeout: 500, host: "cache.test", port: 6380, tls: true },
      username: "app",
      password: "test-secret",
      database: 2,
    });
    expect(onlyClient().store.get("sess:a")).toBe('{"visits":1}');
  });

  it("connects_once_and_quits_on_close", async () => {
    const cache = new RedisSessionCache({ url: "redis://cache.test:6379" });

    await cache.set("sess:a", "{}", 60);
    await expect(cache.get("sess:a")).resolves.toBe("{}");
    await cache.delete("sess:a");

    const client = onlyClient();
    expect(redis.createClient).toHaveBeenCalledWith({ url: "redis://cache.test:6379" });
    expect(client.connect).toHaveBeenCalledTimes(1);
    expect(client.quit).not.toHaveBeenCalled();

    await cache.close();
    expect(client.quit).toHaveBeenCalledTimes(1);
    expect(client.isOpen).toBe(false);
  });

  it("close_before_first_use_creates_nothing", async () => {
    const cache = new RedisSessionCache({ url: "redis://cache.test:6379" });

    await cache.close();

    expect(redis.createClient).not.toHaveBeenCalled();
  });

  it("skips_connect_when_lazy", async () => {
    const cache = new RedisSessionCache({ host: "cache.test", lazyConnect: true });

    await expect(cache.get("sess:missing")).resolves.toBeNull();

    const client = onlyClient();
    expect(client.options).toEqual({ socket: { host: "cache.test" } });
    expect(client.connect).not.toHaveBeenCalled();
  });

  it("reports_connect_failures_as_store_unavailable", async () => {
    redis.failConnectWith(Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:6379"), { code: "ECONNREFUSED" }));
    const cache = new RedisSessionCache({ url: "redis://cache.test:6379" });

    await expect(cache.get("sess:a")).rejects.toMatchObject({
      code: "STORE_UNAVAILABLE",
      details: { key: "sess:a", operation: "connect", redisCode: "ECONNREFUSED" },
    });
  });
});

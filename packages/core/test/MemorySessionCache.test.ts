import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemorySessionCache, decodeSessionData, encodeSessionData } from "../src";

describe("MemorySessionCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_700_000_000_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("expires_entries_after_their_ttl", async () => {
    const cache = new MemorySessionCache();
    await cache.set("sess:a", "{}", 10);

    vi.advanceTimersByTime(9_999);
    await expect(cache.get("sess:a")).resolves.toBe("{}");

    vi.advanceTimersByTime(1);
    await expect(cache.get("sess:a")).resolves.toBeNull();
    await cache.close();
  });

  it("keeps_zero_ttl_entries_indefinitely", async () => {
    const cache = new MemorySessionCache();
    await cache.set("sess:a", "{}", 0);

    vi.advanceTimersByTime(86_400_000);
    await expect(cache.get("sess:a")).resolves.toBe("{}");
    await cache.close();
  });

  it("sweeps_expired_entries_periodically", async () => {
    const cache = new MemorySessionCache({ cleanupIntervalSeconds: 30 });
    await cache.set("sess:short", "{}", 1);
    await cache.set("sess:long", "{}", 3600);

    vi.advanceTimersByTime(30_000);
    expect(cache.size).toBe(1);
    await cache.close();
  });

  it("evicts_the_oldest_entry_at_capacity", async () => {
    const cache = new MemorySessionCache({ maxSize: 2 });
    await cache.set("sess:a", "1", 60);
    await cache.set("sess:b", "2", 60);
    await cache.set("sess:b", "3", 60);
    expect(cache.size).toBe(2);

    await cache.set("sess:c", "4", 60);
    await expect(cache.get("sess:a")).resolves.toBeNull();
    await expect(cache.get("sess:b")).resolves.toBe("3");
    await expect(cache.get("sess:c")).resolves.toBe("4");
    await cache.close();
  });

  it("delete_removes_the_entry", async () => {
    const cache = new MemorySessionCache();
    await cache.set("sess:a", "{}", 60);
    await cache.delete("sess:a");
    await expect(cache.get("sess:a")).resolves.toBeNull();
    await cache.close();
  });
});

describe("session data codec", () => {
  it("encodes_as_json", () => {
    expect(encodeSessionData({ visits: 1, tags: ["a"], nested: { ok: true } })).toBe(
      '{"visits":1,"tags":["a"],"nested":{"ok":true}}',
    );
  });

  it("decodes_objects", () => {
    expect(decodeSessionData('{"visits":5,"user":{"id":"u1"}}')).toEqual({ visits: 5, user: { id: "u1" } });
  });

  it.each([
    ["missing", null],
    ["empty", ""],
    ["invalid json", "{visits:"],
    ["array", "[1,2]"],
    ["string", '"hello"'],
    ["number", "42"],
    ["null", "null"],
  ])("decodes_%s_payload_to_empty_data", (_label, raw) => {
    expect(decodeSessionData(raw)).toEqual({});
  });
});

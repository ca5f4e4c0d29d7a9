import { SessionBagError, isSessionBagError, type Logger } from "../errors";
import type { SessionCache } from "../store/SessionCache";
import type { SessionData } from "./Session";
import { encodeSessionData, tryDecodeSessionData } from "./SessionSerializer";

type CacheOperation = "get" | "set" | "delete";

/**
 * Maps session ids to prefixed cache keys and encodes payloads.
 */
export class SessionManager {
  constructor(
    private readonly cache: SessionCache,
    private readonly keyPrefix: string,
    private readonly logger?: Logger,
  ) {}

  keyFor(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }

  async load(sessionId: string): Promise<SessionData> {
    const key = this.keyFor(sessionId);
    const raw = await this.run("get", key, () => this.cache.get(key));
    if (raw === null || raw === "") {
      return {};
    }

    const data = tryDecodeSessionData(raw);
    if (data === null) {
      this.logger?.debug("Discarding malformed session payload.", { key });
      return {};
    }
    return data;
  }

  async save(sessionId: string, data: SessionData, ttlSeconds: number): Promise<void> {
    const key = this.keyFor(sessionId);
    await this.run("set", key, () => this.cache.set(key, encodeSessionData(data), ttlSeconds));
  }

  async remove(sessionId: string): Promise<void> {
    const key = this.keyFor(sessionId);
    await this.run("delete", key, () => this.cache.delete(key));
  }

  private async run<T>(operation: CacheOperation, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger?.warn("Session cache operation failed.", { key, operation, error });
      if (isSessionBagError(error)) throw error;
      throw new SessionBagError("STORE_UNAVAILABLE", "Session store is unavailable.", error, { key, operation });
    }
  }
}

import type { SessionCache } from "./SessionCache";
import { nowMs, secondsToMs } from "../utils/time";

type Entry = { value: string; expiresAt: number | null };

/**
 * In-process {@link SessionCache}. Suitable for tests and single-process deployments.
 */
export class MemorySessionCache implements SessionCache {
    private readonly map = new Map<string, Entry>();
    private readonly cleanupTimer: NodeJS.Timeout | null;

    constructor(
        private readonly options?: {
            cleanupIntervalSeconds?: number; // default 60
            maxSize?: number; // optional safety
        }
    ) {
        const interval = secondsToMs(options?.cleanupIntervalSeconds ?? 60);
        this.cleanupTimer = setInterval(() => this.cleanup(), interval);
        this.cleanupTimer.unref?.();
    }

    get size(): number {
        return this.map.size;
    }

    async get(key: string): Promise<string | null> {
        const e = this.map.get(key);
        if (!e) return null;

        if (e.expiresAt !== null && nowMs() >= e.expiresAt) {
            this.map.delete(key);
            return null;
        }
        return e.value;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        if (this.options?.maxSize && !this.map.has(key) && this.map.size >= this.options.maxSize) {
            this.cleanup();
            if (this.map.size >= this.options.maxSize) {
                const firstKey = this.map.keys().next().value;
                if (firstKey !== undefined) this.map.delete(firstKey);
            }
        }

        const expiresAt = ttlSeconds > 0 ? nowMs() + secondsToMs(ttlSeconds) : null;
        this.map.set(key, { value, expiresAt });
    }

    async delete(key: string): Promise<void> {
        this.map.delete(key);
    }

    async close(): Promise<void> {
        if (this.cleanupTimer) clearInterval(this.cleanupTimer);
        this.map.clear();
    }

    private cleanup(): void {
        const now = nowMs();
        for (const [k, e] of this.map.entries()) {
            if (e.expiresAt !== null && now >= e.expiresAt) this.map.delete(k);
        }
    }
}

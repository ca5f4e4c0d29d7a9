import { SessionBagError } from "../errors";
import { generateSessionId, isValidSessionId } from "./SessionId";

/**
 * JSON-encodable value stored in a session.
 */
export type SessionValue = string | number | boolean | null | SessionValue[] | { [key: string]: SessionValue };

/**
 * Session payload as persisted in the cache.
 */
export type SessionData = { [key: string]: SessionValue };

/**
 * Mutable per-request session bag.
 *
 * A session with no incoming id stays inert until {@link Session.begin} (or a
 * regeneration) marks it for persistence. Once destroyed it ignores further
 * mutation and regeneration.
 */
export class Session {
    private id: string | null;
    private oldId: string | null = null;
    private readonly data = new Map<string, SessionValue>();
    private begun: boolean;
    private dirty = false;
    private destroyed = false;
    private regenerated = false;

    constructor(id: string | null, data: SessionData = {}) {
        this.id = id === "" ? null : id;
        this.begun = this.id !== null;
        for (const [key, value] of Object.entries(data)) {
            this.data.set(key, value);
        }
    }

    getId(): string | null {
        return this.id;
    }

    /**
     * Id held before the most recent regeneration, if any.
     */
    getOldId(): string | null {
        return this.oldId;
    }

    begin(): void {
        this.begun = true;
    }

    /** Alias of {@link Session.begin}. */
    start(): void {
        this.begin();
    }

    isBegun(): boolean {
        return this.begun;
    }

    isDirty(): boolean {
        return this.dirty;
    }

    isDestroyed(): boolean {
        return this.destroyed;
    }

    isRegenerated(): boolean {
        return this.regenerated;
    }

    get(key: string): SessionValue | undefined;
    get(key: string, fallback: SessionValue): SessionValue;
    get(key: string, fallback?: SessionValue): SessionValue | undefined {
        const value = this.data.get(key);
        return value === undefined ? fallback : value;
    }

    has(key: string): boolean {
        return this.data.has(key);
    }

    set(key: string, value: SessionValue): void {
        if (this.destroyed) return;
        this.data.set(key, value);
        this.dirty = true;
    }

    remove(key: string): void {
        if (this.destroyed) return;
        if (this.data.delete(key)) {
            this.dirty = true;
        }
    }

    replace(data: SessionData): void {
        if (this.destroyed) return;
        this.data.clear();
        for (const [key, value] of Object.entries(data)) {
            this.data.set(key, value);
        }
        this.dirty = true;
    }

    /**
     * Returns a copy of the session payload.
     */
    all(): SessionData {
        return Object.fromEntries(this.data);
    }

    /**
     * Replaces the session id, remembering the previous one so its cache entry
     * can be removed. Repeating the current id is a no-op.
     */
    regenerateId(newId: string): void {
        if (this.destroyed || newId === this.id) return;
        if (!isValidSessionId(newId)) {
            throw new SessionBagError("INVALID_SESSION_ID", "Session id must be 16-128 hexadecimal characters.");
        }

        this.oldId = this.id;
        this.id = newId;
        this.regenerated = true;
        this.begun = true;
        this.dirty = true;
    }

    /**
     * Regenerates with a freshly generated id and returns the resulting id.
     */
    regenerate(): string | null {
        this.regenerateId(generateSessionId());
        return this.id;
    }

    /**
     * Clears the payload and marks the session for deletion. The id is kept so
     * the cache entry can be removed.
     */
    destroy(): void {
        this.data.clear();
        this.destroyed = true;
        this.dirty = true;
    }
}

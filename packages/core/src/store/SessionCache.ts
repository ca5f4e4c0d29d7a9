/**
 * Key-value cache the reconciler persists session payloads into.
 *
 * A `ttlSeconds` of 0 stores the value without expiry.
 */
export interface SessionCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  close?(): Promise<void>;
}

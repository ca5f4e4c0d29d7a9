import type { CookieOptions, ResolvedCookieOptions } from "./cookie/CookiePolicy";
import type { SessionCache } from "./store/SessionCache";
import type { Logger } from "./errors";

/**
 * Root configuration for creating a {@link SessionBag} instance.
 */
export type SessionBagOptions = {
    cache: SessionCache;

    ttlSeconds?: number; // default 3600, 0 = browser-session cookie
    keyPrefix?: string; // default "sess:"

    cookie?: CookieOptions;

    clock?: () => number; // epoch milliseconds, default Date.now

    logger?: Logger;
};

/**
 * {@link SessionBagOptions} with every default applied.
 */
export type ResolvedSessionBagOptions = {
    cache: SessionCache;
    ttlSeconds: number;
    keyPrefix: string;
    cookie: ResolvedCookieOptions;
    clock: () => number;
    logger: Logger | undefined;
};

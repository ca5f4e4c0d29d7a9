import { isSameSite, type ResolvedCookieOptions } from "./cookie/CookiePolicy";
import { SessionBagError } from "./errors";
import type { ResolvedSessionBagOptions, SessionBagOptions } from "./types";
import { nowMs } from "./utils/time";

const DEFAULT_TTL_SECONDS = 3600;
const DEFAULT_KEY_PREFIX = "sess:";

// Grammar enforced by `cookie.serialize`.
const COOKIE_NAME_PATTERN = /^[\u0021-\u003A\u003C\u003E-\u007E]+$/;
const COOKIE_PATH_PATTERN = /^[\u0020-\u003A\u003D-\u007E]*$/;
const COOKIE_DOMAIN_PATTERN = /^([.]?[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)([.][a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)*$/i;

/**
 * Applies defaults and validates {@link SessionBagOptions}.
 *
 * `sameSite: "none"` forces `secure`, since browsers reject insecure `SameSite=None` cookies.
 */
export function resolveSessionBagOptions(opts: SessionBagOptions): ResolvedSessionBagOptions {
    return {
        cache: opts.cache,
        ttlSeconds: resolveTtl(opts.ttlSeconds),
        keyPrefix: opts.keyPrefix ?? DEFAULT_KEY_PREFIX,
        cookie: resolveCookieOptions(opts),
        clock: opts.clock ?? nowMs,
        logger: opts.logger,
    };
}

function resolveTtl(ttlSeconds: number | undefined): number {
    if (ttlSeconds === undefined) return DEFAULT_TTL_SECONDS;
    if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
        throw new SessionBagError("INVALID_OPTIONS", "ttlSeconds must be a non-negative number.", undefined, {
            ttlSeconds,
        });
    }
    return Math.floor(ttlSeconds);
}

function resolveCookieOptions(opts: SessionBagOptions): ResolvedCookieOptions {
    const cookie = opts.cookie ?? {};
    const name = cookie.name ?? "SID";
    if (name === "") {
        throw new SessionBagError("INVALID_OPTIONS", "cookie.name must not be empty.");
    }
    if (!COOKIE_NAME_PATTERN.test(name)) {
        throw new SessionBagError("INVALID_OPTIONS", `Invalid cookie.name: ${name}`, undefined, { name });
    }

    const path = cookie.path ?? "/";
    if (!COOKIE_PATH_PATTERN.test(path)) {
        throw new SessionBagError("INVALID_OPTIONS", `Invalid cookie.path: ${path}`, undefined, { path });
    }

    const domain = cookie.domain ?? "";
    if (domain !== "" && !COOKIE_DOMAIN_PATTERN.test(domain)) {
        throw new SessionBagError("INVALID_OPTIONS", `Invalid cookie.domain: ${domain}`, undefined, { domain });
    }

    const sameSite = (cookie.sameSite ?? "lax").toLowerCase();
    if (!isSameSite(sameSite)) {
        throw new SessionBagError("INVALID_OPTIONS", `Unsupported cookie.sameSite: ${sameSite}`, undefined, {
            sameSite,
        });
    }

    return {
        name,
        path,
        domain,
        secure: sameSite === "none" ? true : (cookie.secure ?? false),
        httpOnly: cookie.httpOnly ?? true,
        sameSite,
    };
}

import { secondsToMs } from "../utils/time";

export const SAME_SITE_VALUES = ["", "lax", "strict", "none"] as const;

/**
 * `SameSite` mode. An empty string omits the attribute.
 */
export type SameSite = (typeof SAME_SITE_VALUES)[number];

/**
 * Cookie configuration accepted by {@link SessionBag}.
 */
export type CookieOptions = {
    name?: string; // default "SID"
    path?: string; // default "/"
    domain?: string; // default "" (host-only)
    secure?: boolean; // default false, forced on by sameSite "none"
    httpOnly?: boolean; // default true
    sameSite?: SameSite; // default "lax"
};

export type ResolvedCookieOptions = Required<CookieOptions>;

/**
 * Cookie write produced by the reconciler: either hand the client its session
 * id or tell it to forget the cookie.
 */
export type CookieDirective = {
    kind: "issue" | "expire";
    name: string;
    value: string;
    path: string;
    domain?: string;
    secure: boolean;
    httpOnly: boolean;
    sameSite?: Exclude<SameSite, "">;
    maxAgeSeconds?: number;
    expires?: Date;
};

export function isSameSite(value: unknown): value is SameSite {
    return SAME_SITE_VALUES.some((mode) => mode === value);
}

/**
 * Cookie carrying the session id. A non-positive ttl yields a browser-session cookie.
 */
export function issueCookie(
    options: ResolvedCookieOptions,
    ttlSeconds: number,
    sessionId: string,
    nowMs: number
): CookieDirective {
    const directive: CookieDirective = { kind: "issue", ...baseAttributes(options), value: sessionId };
    if (ttlSeconds > 0) {
        directive.maxAgeSeconds = ttlSeconds;
        directive.expires = new Date(nowMs + secondsToMs(ttlSeconds));
    }
    return directive;
}

/**
 * Cookie that makes the client drop its session id.
 */
export function expireCookie(options: ResolvedCookieOptions): CookieDirective {
    return {
        kind: "expire",
        ...baseAttributes(options),
        value: "",
        maxAgeSeconds: 0,
        expires: new Date(0),
    };
}

function baseAttributes(options: ResolvedCookieOptions): Omit<CookieDirective, "kind" | "value"> {
    return {
        name: options.name,
        path: options.path,
        secure: options.secure || options.sameSite === "none",
        httpOnly: options.httpOnly,
        ...(options.domain !== "" ? { domain: options.domain } : {}),
        ...(options.sameSite !== "" ? { sameSite: options.sameSite } : {}),
    };
}

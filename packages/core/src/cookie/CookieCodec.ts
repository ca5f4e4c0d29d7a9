import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";
import type { CookieDirective } from "./CookiePolicy";

/**
 * Reads one cookie from a raw `Cookie` request header.
 */
export function readCookie(cookieHeader: string | null | undefined, name: string): string | null {
    if (!cookieHeader) return null;
    return parseCookie(cookieHeader)[name] ?? null;
}

/**
 * Serializes a {@link CookieDirective} into a `Set-Cookie` header value.
 */
export function serializeCookieDirective(directive: CookieDirective): string {
    const options: SerializeOptions = {
        path: directive.path,
        httpOnly: directive.httpOnly,
        secure: directive.secure,
    };

    if (directive.domain !== undefined) options.domain = directive.domain;
    if (directive.sameSite !== undefined) options.sameSite = directive.sameSite;
    if (directive.maxAgeSeconds !== undefined) options.maxAge = Math.max(0, Math.floor(directive.maxAgeSeconds));
    if (directive.expires !== undefined) options.expires = directive.expires;

    return serializeCookie(directive.name, directive.value, options);
}

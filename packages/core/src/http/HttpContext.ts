import type { CookieDirective } from "../cookie/CookiePolicy";
import type { Session } from "../session/Session";

/**
 * Framework-neutral HTTP context required by SessionBag.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(directive: CookieDirective): void;

    // Request-scoped session slot
    setSession(session: Session): void;
    getSession(): Session | null;

    /**
     * True when the downstream handler failed and the framework already turned
     * the failure into an error response.
     */
    handlerFailed(): boolean;
}

/**
 * Middleware function signature used by SessionBag core.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;

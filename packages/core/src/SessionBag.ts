import type { ResolvedSessionBagOptions, SessionBagOptions } from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import { expireCookie, issueCookie } from "./cookie/CookiePolicy";
import { SessionBagError } from "./errors";
import { resolveSessionBagOptions } from "./options";
import { Session } from "./session/Session";
import { generateSessionId, isValidSessionId } from "./session/SessionId";
import { SessionManager } from "./session/SessionManager";

/**
 * Attaches a {@link Session} to every request and reconciles it with the
 * cache once the downstream handler has produced a response.
 */
export class SessionBag {
    private readonly opts: ResolvedSessionBagOptions;
    private readonly manager: SessionManager;

    constructor(options: SessionBagOptions) {
        this.opts = resolveSessionBagOptions(options);
        this.manager = new SessionManager(this.opts.cache, this.opts.keyPrefix, this.opts.logger);
    }

    middleware(): HttpMiddleware {
        return async (ctx, next) => {
            const incomingId = this.readIncomingId(ctx);
            const data = incomingId !== null ? await this.manager.load(incomingId) : {};

            const session = new Session(incomingId, data);
            ctx.setSession(session);

            // A throwing handler skips reconciliation entirely.
            await next();
            if (ctx.handlerFailed()) {
                this.opts.logger?.debug("Handler failed; session left untouched.", { sessionId: incomingId });
                return;
            }

            await this.reconcile(ctx, session, incomingId);
        };
    }

    getSession(ctx: HttpContext): Session {
        const session = ctx.getSession();
        if (!session) {
            throw new SessionBagError("SESSION_NOT_ATTACHED", "Session middleware is not installed for this route.");
        }
        return session;
    }

    private readIncomingId(ctx: HttpContext): string | null {
        const incoming = ctx.getCookie(this.opts.cookie.name);
        if (incoming === null) return null;

        const length = incoming.length;
        if (!isValidSessionId(incoming)) {
            this.opts.logger?.debug("Ignoring malformed session cookie.", { length });
            return null;
        }
        return incoming;
    }

    private async reconcile(ctx: HttpContext, session: Session, incomingId: string | null): Promise<void> {
        // Nothing inherited and nothing begun: no id, no cookie, no write.
        if (!session.isBegun() && session.getId() === null) {
            return;
        }

        if (session.isDestroyed()) {
            const doomedId = incomingId ?? session.getId();
            if (doomedId !== null) {
                await this.manager.remove(doomedId);
            }
            this.opts.logger?.debug("Session destroyed.", { sessionId: doomedId });
            ctx.setCookie(expireCookie(this.opts.cookie));
            return;
        }

        const effectiveId = session.getId() ?? this.assignId(session);
        const pending: Promise<void>[] = [];

        // Only the id this request loaded can have a cache entry; ids assigned
        // and replaced within the request were never written.
        const staleId = session.isRegenerated() ? incomingId : null;
        if (staleId !== null && staleId !== effectiveId) {
            this.opts.logger?.debug("Session id regenerated.", { sessionId: effectiveId, oldSessionId: staleId });
            pending.push(this.manager.remove(staleId));
        }

        // Sliding expiration: rewrite on every reconciling response, dirty or not.
        pending.push(this.manager.save(effectiveId, session.all(), this.opts.ttlSeconds));
        // Both operations settle before the response is released, even when one fails.
        const results = await Promise.allSettled(pending);
        for (const result of results) {
            if (result.status === "rejected") throw result.reason;
        }

        ctx.setCookie(issueCookie(this.opts.cookie, this.opts.ttlSeconds, effectiveId, this.opts.clock()));
    }

    /**
     * Deferred id creation for sessions begun without an incoming id. There is
     * no previous key, so the session's old id stays null.
     */
    private assignId(session: Session): string {
        const id = generateSessionId();
        session.regenerateId(id);
        return id;
    }
}

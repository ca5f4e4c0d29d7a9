import {
  defaultErrorBody,
  isSessionBagError,
  readCookie,
  serializeCookieDirective,
  SessionBagError,
  statusFromErrorCode,
  type HttpContext,
  type HttpMiddleware,
  type Session,
  type SessionBag,
} from "@sessionbag/core";
import type { Context, MiddlewareHandler } from "hono";

/**
 * Context key used to store the request's session on Hono context.
 */
export const SESSION_CONTEXT_KEY = "session";

/**
 * Hono env exposing the session as `c.get("session")`.
 */
export type SessionBagEnv = {
  Variables: {
    [SESSION_CONTEXT_KEY]: Session;
  };
};

/**
 * Adapter options for Hono integration.
 */
export type SessionBagHonoAdapterOptions = {
  onError?: (error: SessionBagError, c: Context<SessionBagEnv>) => Promise<Response | void> | Response | void;
};

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context<SessionBagEnv>): HttpContext {
  return {
    getCookie(name: string): string | null {
      return readCookie(c.req.header("cookie"), name);
    },

    setCookie(directive) {
      c.header("Set-Cookie", serializeCookieDirective(directive), { append: true });
    },

    setSession(session: Session): void {
      c.set(SESSION_CONTEXT_KEY, session);
    },

    getSession(): Session | null {
      return c.get(SESSION_CONTEXT_KEY) ?? null;
    },

    handlerFailed(): boolean {
      return c.error !== undefined;
    },
  };
}

/**
 * Converts core middleware into a Hono middleware handler.
 */
export function toHonoMiddleware(
  middleware: HttpMiddleware,
  options?: SessionBagHonoAdapterOptions,
): MiddlewareHandler<SessionBagEnv> {
  return async (c, next) => {
    const ctx = createHonoHttpContext(c);

    try {
      await middleware(ctx, async () => {
        await next();
      });
    } catch (error) {
      if (!isSessionBagError(error)) {
        throw error;
      }

      if (options?.onError) {
        const handled = await options.onError(error, c);
        if (handled) {
          c.res = handled;
          return;
        }
      }

      c.res = c.json(defaultErrorBody(error.code, error.message), statusFromErrorCode(error.code));
    }
  };
}

/**
 * Hono middleware attaching a session to every request handled after it.
 */
export function sessionMiddleware(
  bag: SessionBag,
  options?: SessionBagHonoAdapterOptions,
): MiddlewareHandler<SessionBagEnv> {
  return toHonoMiddleware(bag.middleware(), options);
}

/**
 * Returns the session attached by {@link sessionMiddleware}.
 */
export function getSession(c: Context<SessionBagEnv>): Session {
  const session = c.get(SESSION_CONTEXT_KEY);
  if (!session) {
    throw new SessionBagError("SESSION_NOT_ATTACHED", "Session middleware is not installed for this route.");
  }
  return session;
}

export {
  SESSION_CONTEXT_KEY,
  createHonoHttpContext,
  getSession,
  sessionMiddleware,
  toHonoMiddleware,
  type SessionBagEnv,
  type SessionBagHonoAdapterOptions,
} from "./HonoAdapter";

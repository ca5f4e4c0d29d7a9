export * from "./types";
export * from "./errors";
export * from "./options";

export * from "./http/HttpContext";

export * from "./store/SessionCache";
export * from "./store/MemorySessionCache";

export * from "./cookie/CookiePolicy";
export * from "./cookie/CookieCodec";

export * from "./session/Session";
export * from "./session/SessionId";
export * from "./session/SessionManager";
export * from "./session/SessionSerializer";

export * from "./SessionBag";

import { SessionBagError, isSessionBagError } from "@sessionbag/core";

export type RedisOperation = "connect" | "get" | "set" | "delete";

const STORE_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "NR_CLOSED",
]);

const STORE_ERROR_KEYWORDS = [
  "connect",
  "connection",
  "socket",
  "closed",
  "timeout",
  "read only",
  "loading",
  "clusterdown",
  "try again",
  "no connection",
  "the client is closed",
];

/**
 * Wraps a Redis failure. Connectivity problems become `STORE_UNAVAILABLE`,
 * anything else `INTERNAL_ERROR`.
 */
export function toRedisCacheError(error: unknown, key: string, operation: RedisOperation): SessionBagError {
  if (isSessionBagError(error)) {
    return error;
  }

  const code = classifyRedisError(error);
  return new SessionBagError(
    code,
    code === "STORE_UNAVAILABLE" ? "Session store is unavailable." : "Redis cache operation failed.",
    error,
    {
      key,
      operation,
      redisCode: getErrorCode(error),
    },
  );
}

export function classifyRedisError(error: unknown): "STORE_UNAVAILABLE" | "INTERNAL_ERROR" {
  if (STORE_ERROR_CODES.has(getErrorCode(error))) {
    return "STORE_UNAVAILABLE";
  }

  const msg = getErrorMessage(error).toLowerCase();
  if (STORE_ERROR_KEYWORDS.some((k) => msg.includes(k))) {
    return "STORE_UNAVAILABLE";
  }

  return "INTERNAL_ERROR";
}

function getErrorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code).toUpperCase();
  }
  return "";
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "");
}

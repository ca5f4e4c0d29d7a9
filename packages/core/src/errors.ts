/**
 * Stable error codes surfaced by SessionBag core and adapters.
 */
export type ErrorCode =
    | "INVALID_OPTIONS"
    | "INVALID_SESSION_ID"
    | "SESSION_NOT_ATTACHED"
    | "STORE_UNAVAILABLE"
    | "INTERNAL_ERROR";

/**
 * Canonical error type used across SessionBag packages.
 */
export class SessionBagError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SessionBagError";
        this.details = details;
    }
}

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * HTTP statuses produced by {@link statusFromErrorCode}.
 */
export type ErrorStatus = 500 | 503;

/**
 * Logger contract used by SessionBag core for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Creates a normalized error response body.
 */
export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link SessionBagError}.
 */
export function isSessionBagError(error: unknown): error is SessionBagError {
    return error instanceof SessionBagError;
}

/**
 * Maps {@link ErrorCode} to an HTTP status code.
 */
export function statusFromErrorCode(code: ErrorCode): ErrorStatus {
    switch (code) {
        case "STORE_UNAVAILABLE":
            return 503;
        case "INVALID_OPTIONS":
        case "INVALID_SESSION_ID":
        case "SESSION_NOT_ATTACHED":
        case "INTERNAL_ERROR":
        default:
            return 500;
    }
}

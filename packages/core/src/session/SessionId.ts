import { randomBytes } from "node:crypto";

const SESSION_ID_BYTES = 32;
const MIN_SESSION_ID_LENGTH = 16;
const MAX_SESSION_ID_LENGTH = 128;
const HEX_PATTERN = /^[A-Fa-f0-9]+$/;

/**
 * Generates a cryptographically random, hex-encoded session id (64 characters).
 */
export function generateSessionId(): string {
    return randomBytes(SESSION_ID_BYTES).toString("hex");
}

/**
 * Accepts hex strings of 16 to 128 characters. Everything else counts as "no session".
 */
export function isValidSessionId(candidate: unknown): candidate is string {
    if (typeof candidate !== "string") return false;
    if (candidate.length < MIN_SESSION_ID_LENGTH || candidate.length > MAX_SESSION_ID_LENGTH) return false;
    return HEX_PATTERN.test(candidate);
}

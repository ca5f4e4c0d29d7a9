import type { SessionData, SessionValue } from "./Session";

export function encodeSessionData(data: SessionData): string {
  return JSON.stringify(data);
}

/**
 * Decodes a cached payload. Missing, unparsable or non-object payloads decode to `{}`.
 */
export function decodeSessionData(raw: string | null): SessionData {
  if (raw === null || raw === "") {
    return {};
  }
  return tryDecodeSessionData(raw) ?? {};
}

/**
 * Like {@link decodeSessionData} but reports a malformed payload as `null`.
 */
export function tryDecodeSessionData(raw: string): SessionData | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  return isSessionData(parsed) ? parsed : null;
}

export function isSessionData(value: unknown): value is SessionData {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isSessionValue);
}

function isSessionValue(value: unknown): value is SessionValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isSessionValue);
      return isSessionData(value);
    default:
      return false;
  }
}

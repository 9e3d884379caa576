/** Longest backend-provided detail copied into an error message. */
const MAX_DETAIL_LENGTH = 500;

function pickString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

function pickMessage(record: Record<string, unknown>): string | null {
  for (const key of ["message", "error", "detail", "error_description"]) {
    const candidate = record[key];
    const direct = pickString(candidate);
    if (direct) {
      return direct;
    }
    if (candidate && typeof candidate === "object" && !Array.isArray(candidate)) {
      const nested = pickString(Object.getOwnPropertyDescriptor(candidate, "message")?.value);
      if (nested) {
        return nested;
      }
    }
  }
  const errors = record["errors"];
  if (Array.isArray(errors) && errors.length > 0) {
    const first: unknown = errors[0];
    if (typeof first === "string") {
      return pickString(first);
    }
    if (first && typeof first === "object") {
      return pickString(Object.getOwnPropertyDescriptor(first, "message")?.value);
    }
  }
  return null;
}

function truncate(value: string): string {
  return value.length <= MAX_DETAIL_LENGTH ? value : `${value.slice(0, MAX_DETAIL_LENGTH)}…`;
}

/**
 * Extracts the most specific human-readable detail from an error body: a
 * `message`/`error`/`detail` field of a JSON object, the first entry of an
 * `errors` array, or the raw text. Returns `null` for empty bodies.
 */
export function extractBackendMessage(body: string): string | null {
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      const message = pickMessage(Object.fromEntries(Object.entries(parsed)));
      if (message) {
        return truncate(message);
      }
    }
    if (typeof parsed === "string") {
      return pickString(parsed) ? truncate(parsed.trim()) : null;
    }
  } catch {
    // Not JSON: the raw text is the detail.
  }
  return truncate(trimmed);
}

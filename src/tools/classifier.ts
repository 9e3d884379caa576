import { ZodError } from "zod";

import { type FailureStatus, GatewayError } from "../backend/errors.js";

/** Status and caller-visible message derived from a failure. */
export interface FailureClassification {
  readonly status: FailureStatus;
  readonly message: string;
}

const REDACTED = "[REDACTED]";
const BEARER_PATTERN = /Bearer\s+[^\s"',;]+/gi;

/**
 * Removes every registered secret from {@link text}, along with anything that
 * looks like a bearer credential.
 */
export function scrubSecrets(text: string, secrets: Iterable<string>): string {
  let scrubbed = text;
  for (const secret of secrets) {
    const trimmed = secret.trim();
    if (trimmed.length > 0) {
      scrubbed = scrubbed.split(trimmed).join(REDACTED);
    }
  }
  return scrubbed.replace(BEARER_PATTERN, `Bearer ${REDACTED}`);
}

function describe(error: unknown): FailureClassification {
  if (error instanceof GatewayError) {
    return { status: error.envelopeStatus, message: error.message };
  }
  if (error instanceof ZodError) {
    return { status: "validation_error", message: error.issues[0]?.message ?? "Invalid request parameters" };
  }
  if (error instanceof Error) {
    return { status: "error", message: error.message.length > 0 ? error.message : "Unexpected internal error" };
  }
  return { status: "error", message: typeof error === "string" && error.length > 0 ? error : "Unexpected internal error" };
}

/**
 * Maps any failure to an envelope status: local or backend validation
 * problems become `validation_error`; authentication, transport, backend
 * service and unrecognised failures become `error`.
 */
export function classifyFailure(error: unknown, secrets: Iterable<string> = []): FailureClassification {
  const { status, message } = describe(error);
  return { status, message: scrubSecrets(message, secrets) };
}

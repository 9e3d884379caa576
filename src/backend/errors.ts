/**
 * Canonical taxonomy of the failures the gateway can observe. Each category
 * carries the caller-visible envelope status it collapses to and a default
 * message used when the raising site has nothing more specific to say.
 */
export const GATEWAY_ERROR_TAXONOMY = {
  VALIDATION_ERROR: { status: "validation_error", message: "Invalid request parameters" },
  AUTH_ERROR: { status: "error", message: "Authentication with the analytics backend failed" },
  TRANSPORT_ERROR: { status: "error", message: "Unable to reach the analytics backend" },
  BACKEND_VALIDATION_ERROR: { status: "validation_error", message: "The analytics backend rejected the request" },
  BACKEND_SERVICE_ERROR: { status: "error", message: "The analytics backend failed to process the request" },
} as const;

/** Union of the supported error categories. */
export type GatewayErrorCategory = keyof typeof GATEWAY_ERROR_TAXONOMY;

/** The two failure statuses visible to tool callers. */
export type FailureStatus = (typeof GATEWAY_ERROR_TAXONOMY)[GatewayErrorCategory]["status"];

/** Optional knobs attached to every gateway error. */
export interface GatewayErrorOptions {
  /** HTTP status returned by the backend, when one was received. */
  readonly httpStatus?: number;
  readonly cause?: unknown;
}

/**
 * Base class for every typed failure raised by the gateway. Subclasses only
 * pin the category; the envelope status is derived from the taxonomy so it
 * cannot drift from the classification rules.
 */
export class GatewayError extends Error {
  readonly category: GatewayErrorCategory;
  readonly httpStatus: number | null;

  constructor(category: GatewayErrorCategory, message?: string, options: GatewayErrorOptions = {}) {
    super(message ?? GATEWAY_ERROR_TAXONOMY[category].message, { cause: options.cause });
    this.name = new.target.name;
    this.category = category;
    this.httpStatus = options.httpStatus ?? null;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Envelope status this error collapses to. */
  get envelopeStatus(): FailureStatus {
    return GATEWAY_ERROR_TAXONOMY[this.category].status;
  }
}

/** Malformed tool input detected locally; no network call was made. */
export class ValidationError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
  }
}

/** Credential exchange failure or repeated unauthorised response. */
export class AuthError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("AUTH_ERROR", message, options);
  }
}

/** Why a transport-level failure happened. */
export type TransportFailureReason = "network" | "timeout" | "cancelled";

/** Network failure, deadline expiry or caller cancellation. */
export class TransportError extends GatewayError {
  readonly reason: TransportFailureReason;

  constructor(message: string, reason: TransportFailureReason, options: GatewayErrorOptions = {}) {
    super("TRANSPORT_ERROR", message, options);
    this.reason = reason;
  }
}

/** The backend understood the request but rejected its semantics (4xx). */
export class BackendValidationError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("BACKEND_VALIDATION_ERROR", message, options);
  }
}

/** The backend failed internally (5xx) or answered with an unusable payload. */
export class BackendServiceError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("BACKEND_SERVICE_ERROR", message, options);
  }
}

/** Raised at startup when the environment does not describe a usable gateway. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid gateway configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

import type { DispatchOutcome, RequestDispatcher } from "../backend/dispatcher.js";
import { AuthError, GatewayError, TransportError } from "../backend/errors.js";
import { resolveRoutePath } from "../backend/routes.js";
import { scrubSecrets } from "./classifier.js";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";
export type Connectivity = "connected" | "partial" | "disconnected";

export interface HealthReport {
  readonly status: HealthStatus;
  readonly server: string;
  readonly timestamp: string;
  readonly connectivity: Connectivity;
  readonly services: {
    /** `healthy`, or `error: …` when credentials could not be obtained or were rejected. */
    readonly session: string;
    /** `healthy`, `unexpected_response`, or `error: …`. */
    readonly backend_api: string;
  };
}

export interface HealthCheckDependencies {
  readonly dispatcher: Pick<RequestDispatcher, "send">;
  readonly serverName: string;
  readonly timeoutMs: number;
  readonly secrets: () => Iterable<string>;
  readonly clock?: () => Date;
}

/** Cheap read-only endpoint used for the connectivity check. */
const CONNECTIVITY_PATH = resolveRoutePath({ service: "askme-manager", endpoint: "get-domain" });

function isError(value: string): boolean {
  return value.startsWith("error");
}

function overallStatus(session: string, backend: string): HealthStatus {
  if (isError(session) && isError(backend)) {
    return "unhealthy";
  }
  if (isError(session) || isError(backend) || backend === "unexpected_response") {
    return "degraded";
  }
  return "healthy";
}

async function requestCatalogue(deps: HealthCheckDependencies, signal: AbortSignal | undefined): Promise<DispatchOutcome> {
  try {
    return await deps.dispatcher.send({
      method: "GET",
      path: CONNECTIVITY_PATH,
      responseType: "json",
      timeoutMs: deps.timeoutMs,
      signal,
    });
  } catch (error) {
    if (error instanceof GatewayError) {
      return { ok: false, error };
    }
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new TransportError(`Network error: ${detail}`, "network", { cause: error }) };
  }
}

/**
 * Calls the dataset catalogue endpoint through the dispatcher and summarises
 * the outcome. Failures are reported in the payload, never thrown.
 */
export async function runHealthCheck(deps: HealthCheckDependencies, signal?: AbortSignal): Promise<HealthReport> {
  const timestamp = (deps.clock?.() ?? new Date()).toISOString();
  const outcome = await requestCatalogue(deps, signal);

  let session = "healthy";
  let backend: string;
  let connectivity: Connectivity;
  if (outcome.ok) {
    const isObject = outcome.body.kind === "json" && typeof outcome.body.value === "object" && outcome.body.value !== null;
    backend = isObject ? "healthy" : "unexpected_response";
    connectivity = isObject ? "connected" : "partial";
    if (outcome.body.kind === "stream") {
      await outcome.body.chunks.close();
    }
  } else {
    const detail = `error: ${scrubSecrets(outcome.error.message, deps.secrets())}`;
    backend = detail;
    if (outcome.error instanceof AuthError) {
      session = detail;
      connectivity = "disconnected";
    } else {
      connectivity = outcome.error.httpStatus !== null ? "partial" : "disconnected";
    }
  }

  return {
    status: overallStatus(session, backend),
    server: deps.serverName,
    timestamp,
    connectivity,
    services: { session, backend_api: backend },
  };
}

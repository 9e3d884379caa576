import type { StructuredLogger } from "../logger.js";
import { AbortedWaitError, createDeadline, type Deadline } from "../infra/abort.js";
import { GATEWAY_USER_AGENT } from "./authClient.js";
import {
  AuthError,
  BackendServiceError,
  BackendValidationError,
  GatewayError,
  TransportError,
} from "./errors.js";
import { extractBackendMessage } from "./responseBody.js";
import { buildBackendUrl, type HttpMethod, type ResponseType } from "./routes.js";
import type { SessionSnapshot, TokenSource } from "./session.js";
import { createChunkStream, type ChunkStream } from "./stream.js";

/** Outgoing backend call as described by the tool layer. */
export interface DispatchRequest {
  readonly method: HttpMethod;
  /** Path relative to the backend base URL. */
  readonly path: string;
  /** JSON body; ignored for `GET`. */
  readonly payload?: unknown;
  readonly query?: Readonly<Record<string, string | number>>;
  readonly responseType: ResponseType;
  /** Overrides the dispatcher default deadline. */
  readonly timeoutMs?: number;
  /** Caller cancellation; aborts the in-flight fetch and any pending read. */
  readonly signal?: AbortSignal;
}

export type DispatchBody =
  | { readonly kind: "json"; readonly value: unknown }
  | { readonly kind: "stream"; readonly chunks: ChunkStream };

/**
 * Result of {@link RequestDispatcher.send}. Backend and transport failures are
 * values, never exceptions.
 */
export type DispatchOutcome =
  | { readonly ok: true; readonly status: number; readonly body: DispatchBody }
  | { readonly ok: false; readonly error: GatewayError };

/** What a single attempt produced and whether the 401 rule allows another one. */
interface AttemptResult {
  readonly outcome: DispatchOutcome;
  readonly retryable: boolean;
  /** Token the backend rejected, handed to {@link TokenSource.invalidate}. */
  readonly staleToken: string | null;
}

export interface RequestDispatcherOptions {
  readonly baseUrl: string;
  readonly tokenSource: TokenSource;
  readonly fetchImpl?: typeof fetch;
  readonly defaultTimeoutMs?: number;
  readonly logger?: StructuredLogger;
}

const DEFAULT_TIMEOUT_MS = 60_000;
/** The initial attempt plus the single retry after a credential refresh. */
const MAX_ATTEMPTS = 2;

function failure(error: GatewayError): DispatchOutcome {
  return { ok: false, error };
}

function final(outcome: DispatchOutcome): AttemptResult {
  return { outcome, retryable: false, staleToken: null };
}

/**
 * Sends authenticated, deadline-bound requests to the analytics backend. Each
 * call runs at most {@link MAX_ATTEMPTS} attempts: a 401 invalidates the
 * rejected token and retries once with a fresh one; any other outcome is
 * final.
 */
export class RequestDispatcher {
  private readonly baseUrl: string;
  private readonly tokenSource: TokenSource;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultTimeoutMs: number;
  private readonly logger?: StructuredLogger;

  constructor(options: RequestDispatcherOptions) {
    this.baseUrl = options.baseUrl;
    this.tokenSource = options.tokenSource;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async send(request: DispatchRequest): Promise<DispatchOutcome> {
    const deadline = createDeadline(request.timeoutMs ?? this.defaultTimeoutMs, request.signal);
    let streaming = false;
    try {
      let attempt = 0;
      while (true) {
        attempt += 1;
        const result = await this.attempt(request, deadline, attempt);
        if (!result.retryable) {
          streaming = result.outcome.ok && result.outcome.body.kind === "stream";
          return result.outcome;
        }
        if (attempt >= MAX_ATTEMPTS) {
          this.logger?.error("backend_unauthorized_after_refresh", { path: request.path });
          return failure(
            new AuthError("The analytics backend rejected the refreshed credentials (HTTP 401)", { httpStatus: 401 }),
          );
        }
        this.logger?.warn("backend_unauthorized_retrying", { path: request.path, attempt });
        this.tokenSource.invalidate(result.staleToken ?? undefined);
      }
    } finally {
      // A streamed body keeps the deadline armed until the stream settles.
      if (!streaming) {
        deadline.clear();
      }
    }
  }

  private async attempt(request: DispatchRequest, deadline: Deadline, attempt: number): Promise<AttemptResult> {
    let session: SessionSnapshot;
    try {
      session = await this.tokenSource.ensureValidToken(deadline.signal);
    } catch (error) {
      return final(failure(this.mapTokenFailure(error, deadline)));
    }

    const url = buildBackendUrl(this.baseUrl, request.path);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    const hasBody = request.method !== "GET" && request.payload !== undefined;
    const headers: Record<string, string> = {
      Accept: request.responseType === "stream" ? "*/*" : "application/json",
      "User-Agent": GATEWAY_USER_AGENT,
      Authorization: `Bearer ${session.accessToken}`,
    };
    if (hasBody) {
      headers["Content-Type"] = "application/json";
    }
    if (session.cookie) {
      headers.Cookie = session.cookie;
    }

    const startedAt = Date.now();
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: request.method,
        headers,
        body: hasBody ? JSON.stringify(request.payload) : undefined,
        signal: deadline.signal,
      });
    } catch (error) {
      return final(failure(transportFailure(error, deadline)));
    }

    this.logger?.debug("backend_response", {
      method: request.method,
      path: request.path,
      status: response.status,
      attempt,
      duration_ms: Date.now() - startedAt,
    });

    if (response.status === 401) {
      await discardBody(response);
      return {
        outcome: failure(new AuthError("The analytics backend rejected the credentials (HTTP 401)", { httpStatus: 401 })),
        retryable: true,
        staleToken: session.accessToken,
      };
    }

    if (!response.ok) {
      return final(failure(await this.readFailure(response, deadline)));
    }

    if (request.responseType === "stream") {
      const chunks = createChunkStream(response.body, {
        mapError: (error) => transportFailure(error, deadline),
        onSettled: () => deadline.clear(),
      });
      return final({ ok: true, status: response.status, body: { kind: "stream", chunks } });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return final(failure(transportFailure(error, deadline)));
    }
    if (text.trim().length === 0) {
      return final({ ok: true, status: response.status, body: { kind: "json", value: null } });
    }
    try {
      const value: unknown = JSON.parse(text);
      return final({ ok: true, status: response.status, body: { kind: "json", value } });
    } catch (error) {
      return final(
        failure(
          new BackendServiceError(`The analytics backend returned malformed JSON (HTTP ${response.status})`, {
            httpStatus: response.status,
            cause: error,
          }),
        ),
      );
    }
  }

  private async readFailure(response: Response, deadline: Deadline): Promise<GatewayError> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return transportFailure(error, deadline);
    }
    const detail = extractBackendMessage(text) ?? `HTTP ${response.status}`;
    const options = { httpStatus: response.status };
    if (response.status >= 400 && response.status < 500) {
      return new BackendValidationError(detail, options);
    }
    if (response.status >= 500) {
      return new BackendServiceError(detail, options);
    }
    return new BackendServiceError(`Unexpected response status ${response.status}: ${detail}`, options);
  }

  private mapTokenFailure(error: unknown, deadline: Deadline): GatewayError {
    if (error instanceof AbortedWaitError) {
      return transportFailure(error, deadline);
    }
    if (error instanceof GatewayError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new AuthError(`Unable to obtain credentials: ${detail}`, { cause: error });
  }
}

/** Maps a fetch or read failure to a {@link TransportError}, using the deadline to tell aborts apart. */
function transportFailure(error: unknown, deadline: Deadline): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  switch (deadline.reason) {
    case "timeout":
      return new TransportError(`Request timed out after ${deadline.timeoutMs}ms`, "timeout", { cause: error });
    case "cancelled":
      return new TransportError("Request was cancelled", "cancelled", { cause: error });
    default: {
      const detail = error instanceof Error ? error.message : String(error);
      return new TransportError(`Network error: ${detail}`, "network", { cause: error });
    }
  }
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch {
    // The connection is already gone; there is nothing left to release.
  }
}

import type { StructuredLogger } from "../logger.js";
import { raceWithSignal } from "../infra/abort.js";
import { runOutsideInvocationContext } from "../infra/invocationContext.js";
import { SingleFlight } from "../infra/singleFlight.js";
import type { TokenExchange } from "./authClient.js";
import type { CredentialStore } from "./credentials.js";
import { AuthError } from "./errors.js";

/** Usable credentials attached to an outgoing backend call. */
export interface SessionSnapshot {
  readonly accessToken: string;
  readonly cookie: string | null;
  /** Epoch milliseconds after which the token must not be used. */
  readonly expiresAt: number;
}

/**
 * Lifecycle of the shared session:
 * `uninitialized → valid → expired → refreshing → valid`. A failed refresh
 * falls back to `uninitialized` (or `expired` when an older token is still
 * remembered) so the next call retries the exchange.
 */
export type SessionState = "uninitialized" | "valid" | "expired" | "refreshing";

/** Source of bearer credentials consumed by the dispatcher. */
export interface TokenSource {
  readonly state: SessionState;
  /**
   * Returns a session usable right now. Aborting {@link signal} only stops the
   * caller from waiting on a shared refresh.
   */
  ensureValidToken(signal?: AbortSignal): Promise<SessionSnapshot>;
  /**
   * Forces the next {@link ensureValidToken} to refresh. When
   * {@link staleToken} no longer matches the current token the call is ignored,
   * so concurrent rejections of the same token trigger a single refresh.
   */
  invalidate(staleToken?: string): void;
  /** Token values that must be scrubbed from messages and logs. */
  redactionTokens(): string[];
}

export interface SessionManagerOptions {
  readonly credentials: CredentialStore;
  readonly exchange: TokenExchange;
  /**
   * Refresh this many milliseconds before the announced expiry. Capped at half
   * of each granted lifetime.
   */
  readonly skewMs?: number;
  /** Lifetime assumed when the backend omits `expires_in`. */
  readonly defaultTtlMs?: number;
  readonly clock?: () => number;
  readonly logger?: StructuredLogger;
}

const DEFAULT_SKEW_MS = 30_000;
const DEFAULT_TTL_MS = 30 * 60_000;
/** Previously issued tokens kept around for redaction only. */
const REDACTION_HISTORY = 4;

/**
 * Owns the process-wide session obtained through the client-credentials
 * exchange. Every mutation goes through {@link refresh}, which runs under a
 * {@link SingleFlight} so concurrent callers share one exchange.
 */
export class SessionManager implements TokenSource {
  private readonly credentials: CredentialStore;
  private readonly exchange: TokenExchange;
  private readonly skewMs: number;
  private readonly defaultTtlMs: number;
  private readonly clock: () => number;
  private readonly logger?: StructuredLogger;
  private readonly flight = new SingleFlight<SessionSnapshot>();
  private session: SessionSnapshot | null = null;
  /** Epoch milliseconds from which the current session is due for refresh. */
  private refreshAt = 0;
  private invalidated = false;
  private readonly issuedTokens: string[] = [];
  private completedRefreshes = 0;

  constructor(options: SessionManagerOptions) {
    this.credentials = options.credentials;
    this.exchange = options.exchange;
    this.skewMs = Math.max(0, options.skewMs ?? DEFAULT_SKEW_MS);
    this.defaultTtlMs = Math.max(1, options.defaultTtlMs ?? DEFAULT_TTL_MS);
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger;
  }

  get state(): SessionState {
    if (this.flight.active) {
      return "refreshing";
    }
    if (!this.session) {
      return "uninitialized";
    }
    return this.isUsable() ? "valid" : "expired";
  }

  /** Number of exchanges that completed successfully. */
  get refreshCount(): number {
    return this.completedRefreshes;
  }

  async ensureValidToken(signal?: AbortSignal): Promise<SessionSnapshot> {
    const current = this.session;
    if (current && this.isUsable()) {
      return current;
    }
    return raceWithSignal(this.refresh(), signal);
  }

  invalidate(staleToken?: string): void {
    const current = this.session;
    if (!current) {
      return;
    }
    if (staleToken !== undefined && staleToken !== current.accessToken) {
      return;
    }
    if (!this.invalidated) {
      this.invalidated = true;
      this.logger?.warn("session_invalidated", { expires_at: new Date(current.expiresAt).toISOString() });
    }
  }

  redactionTokens(): string[] {
    return [...this.issuedTokens];
  }

  private isUsable(): boolean {
    return !this.invalidated && this.clock() < this.refreshAt;
  }

  /** Joins or starts the shared exchange, detached from the caller's invocation context. */
  private refresh(): Promise<SessionSnapshot> {
    return this.flight.run(() => runOutsideInvocationContext(() => this.performRefresh()));
  }

  private async performRefresh(): Promise<SessionSnapshot> {
    const startedAt = this.clock();
    const reason = this.session ? (this.invalidated ? "invalidated" : "expired") : "initial";
    this.logger?.info("session_refresh_started", { reason });
    try {
      const grant = await this.exchange.exchange(this.credentials);
      const ttlMs = grant.expiresInSeconds !== null ? grant.expiresInSeconds * 1_000 : this.defaultTtlMs;
      const issuedAt = this.clock();
      const snapshot: SessionSnapshot = Object.freeze({
        accessToken: grant.accessToken,
        cookie: grant.cookie,
        expiresAt: issuedAt + ttlMs,
      });
      this.session = snapshot;
      this.refreshAt = snapshot.expiresAt - Math.min(this.skewMs, ttlMs / 2);
      this.invalidated = false;
      this.rememberToken(grant.accessToken);
      this.logger?.registerSecrets([grant.accessToken]);
      this.completedRefreshes += 1;
      this.logger?.info("session_refresh_succeeded", {
        reason,
        duration_ms: this.clock() - startedAt,
        expires_at: new Date(snapshot.expiresAt).toISOString(),
      });
      return snapshot;
    } catch (error) {
      const failure =
        error instanceof AuthError
          ? error
          : new AuthError(
              `Token exchange failed: ${error instanceof Error ? error.message : String(error)}`,
              { cause: error },
            );
      this.logger?.error("session_refresh_failed", { reason, message: failure.message });
      throw failure;
    }
  }

  private rememberToken(token: string): void {
    this.issuedTokens.push(token);
    if (this.issuedTokens.length > REDACTION_HISTORY) {
      this.issuedTokens.shift();
    }
  }
}

/**
 * Fixed bearer token configured through an API key. There is nothing to
 * refresh: {@link invalidate} is a no-op and a rejected token surfaces as an
 * authentication failure on the retry.
 */
export class StaticTokenSource implements TokenSource {
  private readonly snapshot: SessionSnapshot;

  constructor(apiKey: string) {
    const token = apiKey.replace(/^Bearer\s+/i, "");
    this.snapshot = Object.freeze({ accessToken: token, cookie: null, expiresAt: Number.POSITIVE_INFINITY });
  }

  get state(): SessionState {
    return "valid";
  }

  async ensureValidToken(): Promise<SessionSnapshot> {
    return this.snapshot;
  }

  invalidate(): void {
    // A configured key cannot be renewed.
  }

  redactionTokens(): string[] {
    return [this.snapshot.accessToken];
  }
}

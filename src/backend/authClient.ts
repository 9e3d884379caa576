import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { createDeadline } from "../infra/abort.js";
import type { CredentialStore } from "./credentials.js";
import { AuthError } from "./errors.js";
import { extractBackendMessage } from "./responseBody.js";
import { LOGIN_PATH, buildBackendUrl } from "./routes.js";

/** Value sent as `User-Agent` on every backend call. */
export const GATEWAY_USER_AGENT = "analytics-mcp-gateway/0.1.0";

/** Outcome of a successful credential exchange. */
export interface TokenGrant {
  readonly accessToken: string;
  /** Lifetime announced by the backend, `null` when it did not say. */
  readonly expiresInSeconds: number | null;
  /** `Cookie` header value to replay on later calls. */
  readonly cookie: string | null;
}

/** Exchanges client credentials for a bearer token. */
export interface TokenExchange {
  exchange(credentials: CredentialStore): Promise<TokenGrant>;
}

export interface ClientCredentialsExchangeOptions {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger;
}

/** Token fields the login endpoint may return in its JSON body. */
const loginResponseSchema = z
  .object({
    access_token: z.string().min(1).optional(),
    expires_in: z.number().positive().optional(),
    cookie: z.string().min(1).optional(),
  })
  .passthrough();

/** Cookie carrying the token when the body does not. */
const ACCESS_TOKEN_COOKIE = "access_token";

/**
 * Client-credentials exchange against the backend login endpoint. The token
 * is read from the JSON body first and from the `access_token` cookie
 * otherwise; the cookie jar announced through `Set-Cookie` is replayed on
 * later calls.
 */
export class ClientCredentialsExchange implements TokenExchange {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: StructuredLogger;

  constructor(options: ClientCredentialsExchangeOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger;
  }

  async exchange(credentials: CredentialStore): Promise<TokenGrant> {
    const url = buildBackendUrl(this.baseUrl, LOGIN_PATH);
    const deadline = createDeadline(this.timeoutMs);
    this.logger?.debug("auth_exchange_started");

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          "User-Agent": GATEWAY_USER_AGENT,
        },
        body: JSON.stringify(credentials.toLoginPayload()),
        signal: deadline.signal,
      });
      text = await response.text();
    } catch (error) {
      if (deadline.reason === "timeout") {
        throw new AuthError(`Authentication request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Network error during authentication: ${detail}`, { cause: error });
    } finally {
      deadline.clear();
    }

    if (!response.ok) {
      const detail = extractBackendMessage(text);
      throw new AuthError(
        `Authentication failed with status ${response.status}${detail ? `: ${detail}` : ""}`,
        { httpStatus: response.status },
      );
    }

    const body = parseLoginBody(text);
    const setCookies = response.headers.getSetCookie();
    const accessToken = body?.access_token ?? readCookie(setCookies, ACCESS_TOKEN_COOKIE);
    if (!accessToken) {
      throw new AuthError("Authentication response did not include an access token", {
        httpStatus: response.status,
      });
    }

    const cookie = body?.cookie ?? buildCookieHeader(setCookies);
    this.logger?.info("auth_exchange_succeeded", {
      expires_in: body?.expires_in ?? null,
      cookie_present: cookie !== null,
    });
    return { accessToken, expiresInSeconds: body?.expires_in ?? null, cookie };
  }
}

function parseLoginBody(text: string): z.infer<typeof loginResponseSchema> | null {
  if (text.trim().length === 0) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    // Cookie-only logins answer with a plain-text body.
    return null;
  }
  const result = loginResponseSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/** Extracts the `name=value` pair of every `Set-Cookie` line. */
function cookiePairs(setCookies: readonly string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const line of setCookies) {
    const pair = line.split(";", 1)[0]?.trim() ?? "";
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    pairs.push([pair.slice(0, separator).trim(), pair.slice(separator + 1).trim()]);
  }
  return pairs;
}

export function readCookie(setCookies: readonly string[], name: string): string | null {
  const match = cookiePairs(setCookies).find(([key, value]) => key === name && value.length > 0);
  return match ? match[1] : null;
}

export function buildCookieHeader(setCookies: readonly string[]): string | null {
  const pairs = cookiePairs(setCookies);
  if (pairs.length === 0) {
    return null;
  }
  return pairs.map(([key, value]) => `${key}=${value}`).join("; ");
}

import process from "node:process";
import { z } from "zod";

import { ConfigError } from "../backend/errors.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { type EnvSource, readEnum, readInt, readOptionalString, readString } from "./env.js";

export type TransportMode = "stdio" | "http";

/** How the gateway authenticates against the analytics backend. */
export type GatewayAuthConfig =
  | { readonly mode: "client_credentials"; readonly clientId: string; readonly secret: string }
  | { readonly mode: "api_key"; readonly apiKey: string };

export interface GatewayConfig {
  /** Backend base URL without trailing slash. */
  readonly serverUrl: string;
  readonly auth: GatewayAuthConfig;
  readonly requestTimeoutMs: number;
  readonly authTimeoutMs: number;
  readonly tokenSkewMs: number;
  readonly tokenTtlMs: number;
  readonly transport: TransportMode;
  readonly http: { readonly host: string; readonly port: number; readonly path: string };
  readonly logging: { readonly file: string | null; readonly level: LogLevel };
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_AUTH_TIMEOUT_MS = 30_000;
export const DEFAULT_TOKEN_SKEW_MS = 30_000;
export const DEFAULT_TOKEN_TTL_MS = 30 * 60_000;
export const DEFAULT_HTTP_PORT = 8080;

const serverUrlSchema = z
  .string()
  .url({ message: "must be a valid URL" })
  .refine((value) => /^https?:\/\//i.test(value), { message: "must use http or https" });

const httpPathSchema = z.string().regex(/^\/[\w\-./]*$/, { message: "must be an absolute path" });

/** Values no caller should ever see in the resolved configuration. */
export function configSecrets(config: GatewayConfig): string[] {
  return config.auth.mode === "api_key" ? [config.auth.apiKey] : [config.auth.secret];
}

function resolveAuth(env: EnvSource, issues: string[]): GatewayAuthConfig | null {
  const apiKey = readOptionalString("ANALYTICS_API_KEY", env);
  if (apiKey) {
    return { mode: "api_key", apiKey };
  }
  const clientId = readOptionalString("ANALYTICS_CLIENT_ID", env);
  const secret = readOptionalString("ANALYTICS_SECRET", env);
  if (clientId && secret) {
    return { mode: "client_credentials", clientId, secret };
  }
  if (!clientId && !secret) {
    issues.push("ANALYTICS_CLIENT_ID and ANALYTICS_SECRET are required unless ANALYTICS_API_KEY is set");
  } else {
    issues.push(`${clientId ? "ANALYTICS_SECRET" : "ANALYTICS_CLIENT_ID"} is required`);
  }
  return null;
}

/**
 * Resolves the gateway configuration from {@link env}. Malformed numbers fall
 * back to their defaults; missing or unusable connection settings are
 * collected and reported together through a {@link ConfigError}.
 */
export function loadGatewayConfig(env: EnvSource = process.env): GatewayConfig {
  const issues: string[] = [];

  const rawUrl = readOptionalString("ANALYTICS_SERVER_URL", env);
  let serverUrl = "";
  if (!rawUrl) {
    issues.push("ANALYTICS_SERVER_URL is required");
  } else {
    const parsed = serverUrlSchema.safeParse(rawUrl);
    if (parsed.success) {
      serverUrl = parsed.data.replace(/\/+$/, "");
    } else {
      issues.push(`ANALYTICS_SERVER_URL ${parsed.error.issues[0]?.message ?? "is invalid"}`);
    }
  }

  const auth = resolveAuth(env, issues);

  const rawPath = readString("MCP_HTTP_PATH", "/mcp", env);
  const path = httpPathSchema.safeParse(rawPath);
  if (!path.success) {
    issues.push(`MCP_HTTP_PATH ${path.error.issues[0]?.message ?? "is invalid"}`);
  }

  if (!auth || issues.length > 0 || !path.success) {
    throw new ConfigError(issues);
  }

  return Object.freeze({
    serverUrl,
    auth: Object.freeze(auth),
    requestTimeoutMs: readInt("ANALYTICS_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, { min: 1 }, env),
    authTimeoutMs: readInt("ANALYTICS_AUTH_TIMEOUT_MS", DEFAULT_AUTH_TIMEOUT_MS, { min: 1 }, env),
    tokenSkewMs: readInt("ANALYTICS_TOKEN_SKEW_MS", DEFAULT_TOKEN_SKEW_MS, { min: 0 }, env),
    tokenTtlMs: readInt("ANALYTICS_TOKEN_TTL_MS", DEFAULT_TOKEN_TTL_MS, { min: 1 }, env),
    transport: readEnum<TransportMode>("MCP_TRANSPORT", ["stdio", "http"], "stdio", env),
    http: Object.freeze({
      host: readString("MCP_HTTP_HOST", "0.0.0.0", env),
      port: readInt("MCP_HTTP_PORT", DEFAULT_HTTP_PORT, { min: 0, max: 65_535 }, env),
      path: path.data,
    }),
    logging: Object.freeze({
      file: readOptionalString("MCP_LOG_FILE", env) ?? null,
      level: readEnum<LogLevel>("MCP_LOG_LEVEL", LOG_LEVELS, "info", env),
    }),
  });
}

#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { ClientCredentialsExchange } from "./backend/authClient.js";
import { CredentialStore } from "./backend/credentials.js";
import { RequestDispatcher } from "./backend/dispatcher.js";
import { SessionManager, StaticTokenSource, type TokenSource } from "./backend/session.js";
import { configSecrets, loadGatewayConfig, type GatewayConfig } from "./config/gateway.js";
import { startHttpServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { GATEWAY_SERVER_INFO, createGatewayServer } from "./mcp/gatewayServer.js";
import { ToolInvocationHandler } from "./tools/handler.js";

/** Fully wired gateway components, independent of the transport. */
export interface GatewayRuntime {
  readonly handler: ToolInvocationHandler;
  readonly tokenSource: TokenSource;
  readonly dispatcher: RequestDispatcher;
  readonly logger: StructuredLogger;
  /** Every value that must be scrubbed from caller-visible output right now. */
  secrets(): string[];
}

export interface GatewayRuntimeOverrides {
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
}

/** Composition root: turns a resolved configuration into live components. */
export function createGatewayRuntime(config: GatewayConfig, overrides: GatewayRuntimeOverrides = {}): GatewayRuntime {
  const logger =
    overrides.logger ?? new StructuredLogger({ logFile: config.logging.file, level: config.logging.level });
  logger.registerSecrets(configSecrets(config));

  let tokenSource: TokenSource;
  if (config.auth.mode === "api_key") {
    tokenSource = new StaticTokenSource(config.auth.apiKey);
  } else {
    tokenSource = new SessionManager({
      credentials: new CredentialStore(config.auth.clientId, config.auth.secret),
      exchange: new ClientCredentialsExchange({
        baseUrl: config.serverUrl,
        timeoutMs: config.authTimeoutMs,
        fetchImpl: overrides.fetchImpl,
        logger,
      }),
      skewMs: config.tokenSkewMs,
      defaultTtlMs: config.tokenTtlMs,
      clock: overrides.clock,
      logger,
    });
  }

  const secrets = (): string[] => [...configSecrets(config), ...tokenSource.redactionTokens()];
  const dispatcher = new RequestDispatcher({
    baseUrl: config.serverUrl,
    tokenSource,
    fetchImpl: overrides.fetchImpl,
    defaultTimeoutMs: config.requestTimeoutMs,
    logger,
  });
  const handler = new ToolInvocationHandler({
    dispatcher,
    requestTimeoutMs: config.requestTimeoutMs,
    secrets,
    serverName: GATEWAY_SERVER_INFO.name,
    logger,
  });

  return { handler, tokenSource, dispatcher, logger, secrets };
}

/**
 * Bootstraps the gateway when the module is executed directly: resolves the
 * configuration, wires the selected transport and registers shutdown hooks.
 */
async function main(): Promise<void> {
  let config: GatewayConfig;
  try {
    config = loadGatewayConfig();
  } catch (error) {
    new StructuredLogger().error("config_invalid", { message: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }

  const { handler, logger } = createGatewayRuntime(config);
  const cleanup: Array<() => Promise<void>> = [];

  if (config.transport === "http") {
    try {
      const handle = await startHttpServer(
        (requestId) => createGatewayServer({ handler, transport: "http", correlationId: requestId }),
        config.http,
        logger,
      );
      cleanup.push(handle.close);
    } catch (error) {
      logger.error("http_start_failed", { message: error instanceof Error ? error.message : String(error) });
      await logger.flush();
      process.exit(1);
    }
  } else {
    const server = createGatewayServer({ handler, transport: "stdio" });
    await server.connect(new StdioServerTransport());
    cleanup.push(() => server.close());
    logger.info("stdio_listening");
  }

  logger.info("gateway_started", {
    transport: config.transport,
    auth_mode: config.auth.mode,
    backend: config.serverUrl,
    request_timeout_ms: config.requestTimeoutMs,
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_signal", { signal });
    for (const closer of cleanup) {
      try {
        await closer();
      } catch (error) {
        logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
      }
    }
    await logger.flush();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exit(1);
  });
}

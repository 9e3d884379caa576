import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { Server as McpServer } from "@modelcontextprotocol/sdk/server/index.js";
import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server as NodeHttpServer,
  type ServerResponse,
} from "node:http";
import process from "node:process";

import type { StructuredLogger } from "./logger.js";
import { PayloadTooLargeError, readJsonBody } from "./http/body.js";
import { applySecurityHeaders, ensureRequestId } from "./http/headers.js";

/** Maximum JSON-RPC payload accepted on the MCP endpoint (1 MiB). */
const MAX_JSON_RPC_BYTES = 1 * 1024 * 1024;

export interface HttpServerOptions {
  readonly host: string;
  readonly port: number;
  readonly path: string;
}

export interface HttpServerHandle {
  close: () => Promise<void>;
  /** Actual port bound by the HTTP server (useful when `0` was requested). */
  port: number;
}

/** Builds a fresh MCP server for one HTTP request, tagged with its correlation id. */
export type McpServerFactory = (requestId: string) => McpServer;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function respondJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload), "utf8");
}

function respondJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  respondJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}

function computeDurationMs(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt) / 1_000_000;
}

/**
 * Serves the MCP endpoint over stateless streamable HTTP. Every POST gets its
 * own server/transport pair, torn down once the response closes, so
 * concurrent clients never share JSON-RPC ids. `/healthz` answers liveness
 * checks without touching the backend.
 */
export async function startHttpServer(
  createServer: McpServerFactory,
  options: HttpServerOptions,
  logger: StructuredLogger,
): Promise<HttpServerHandle> {
  const httpServer = createHttpServer((req, res) => {
    void handleRequest(req, res).catch((error: unknown) => {
      logger.error("http_request_failure", { message: describeError(error) });
      if (!res.headersSent) {
        respondJsonRpcError(res, 500, -32603, "Internal error");
      } else {
        res.end();
      }
    });
  });

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startedAt = process.hrtime.bigint();
    applySecurityHeaders(res);
    const requestId = ensureRequestId(req, res);
    const method = req.method ?? "UNKNOWN";
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    res.once("finish", () => {
      logger.info("http_access", {
        request_id: requestId,
        method,
        route: url.pathname,
        status: res.statusCode,
        duration_ms: computeDurationMs(startedAt),
      });
    });

    if (url.pathname === "/healthz") {
      respondJson(res, 200, { ok: true });
      return;
    }

    if (url.pathname !== options.path) {
      respondJsonRpcError(res, 404, -32601, "Method not found");
      return;
    }

    if (method !== "POST") {
      res.setHeader("Allow", "POST");
      respondJsonRpcError(res, 405, -32000, "Method not allowed");
      return;
    }

    let parsedBody: unknown;
    try {
      parsedBody = (await readJsonBody(req, MAX_JSON_RPC_BYTES)).parsed;
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        respondJsonRpcError(res, 413, -32600, "Payload Too Large");
      } else {
        respondJsonRpcError(res, 400, -32700, "Parse error");
      }
      logger.warn("http_body_rejected", { request_id: requestId, message: describeError(error) });
      return;
    }

    const server = createServer(requestId);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    transport.onerror = (error) => {
      logger.error("http_transport_error", { request_id: requestId, message: describeError(error) });
    };
    res.once("close", () => {
      // Closing the server closes its transport as well.
      server.close().catch((error: unknown) => {
        logger.error("transport_close_failed", { request_id: requestId, message: describeError(error) });
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, parsedBody);
  }

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: describeError(error) });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      httpServer.on("error", (error) => {
        logger.error("http_server_error", { message: describeError(error) });
      });
      logger.info("http_listening", {
        host: options.host,
        port: extractListeningPort(httpServer),
        requested_port: options.port,
        path: options.path,
      });
      resolve();
    });
  });

  return {
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        httpServer.closeAllConnections();
      });
    },
    port: extractListeningPort(httpServer),
  };
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : 0;
}

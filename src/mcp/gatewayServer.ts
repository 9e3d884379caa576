import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";

import type { ToolInvocationHandler } from "../tools/handler.js";
import { toCallToolResult } from "../tools/envelope.js";

/** Identity announced during the MCP handshake. */
export const GATEWAY_SERVER_INFO = { name: "analytics-mcp-gateway", version: "0.1.0" } as const;

const INSTRUCTIONS =
  "Analytics tools answer natural-language questions about a dataset. Call get_dataset_metadata to find a " +
  "schemaId, then pass it with userQuery to nlq_to_data or one of the get_*_data analyses.";

export interface GatewayServerOptions {
  readonly handler: ToolInvocationHandler;
  /** Transport tag attached to every invocation context. */
  readonly transport: string;
  /** Correlation id overriding the JSON-RPC id, e.g. the HTTP `x-request-id`. */
  readonly correlationId?: string;
}

/**
 * Builds the low-level MCP server exposing the tool catalogue. Arguments reach
 * the handler unvalidated so malformed input comes back as a
 * `validation_error` envelope rather than a protocol error.
 */
export function createGatewayServer(options: GatewayServerOptions): Server {
  const { handler } = options;
  const server = new Server(GATEWAY_SERVER_INFO, {
    capabilities: { tools: {} },
    instructions: INSTRUCTIONS,
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools: Tool[] = handler.listTools().map((tool) => ({
      name: tool.name,
      title: tool.title,
      description: tool.description,
      inputSchema: { ...tool.inputSchema },
      annotations: { ...tool.annotations },
    }));
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const envelope = await handler.invoke(request.params.name, request.params.arguments, {
      requestId: options.correlationId ?? extra.requestId,
      transport: options.transport,
      signal: extra.signal,
    });
    return toCallToolResult(envelope);
  });

  return server;
}

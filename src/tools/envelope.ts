import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import type { FailureStatus } from "../backend/errors.js";

/** Envelope returned when the backend answered successfully. */
export type SuccessEnvelope = {
  readonly data: unknown;
  readonly status: "success";
};

/**
 * Envelope returned for any failure. `query` and `schema_id` echo the request
 * fields when the caller supplied them with the expected type.
 */
export type FailureEnvelope = {
  readonly error: string;
  readonly status: FailureStatus;
  readonly query?: string;
  readonly schema_id?: number;
};

/** Tri-state result of every tool invocation. */
export type ToolEnvelope = SuccessEnvelope | FailureEnvelope;

export type EnvelopeStatus = ToolEnvelope["status"];

/** Request fields echoed back on failure envelopes. */
export interface EnvelopeEcho {
  readonly query?: string;
  readonly schemaId?: number;
}

export function successEnvelope(data: unknown): SuccessEnvelope {
  return { data, status: "success" };
}

export function failureEnvelope(status: FailureStatus, error: string, echo: EnvelopeEcho = {}): FailureEnvelope {
  return {
    error,
    status,
    ...(echo.query !== undefined ? { query: echo.query } : {}),
    ...(echo.schemaId !== undefined ? { schema_id: echo.schemaId } : {}),
  };
}

/**
 * Picks the echo fields out of raw tool arguments: `userQuery` when it is a
 * string and `schemaId` when it is a number, whatever their validity.
 */
export function extractEcho(args: unknown): EnvelopeEcho {
  if (!args || typeof args !== "object") {
    return {};
  }
  const query: unknown = Reflect.get(args, "userQuery");
  const schemaId: unknown = Reflect.get(args, "schemaId");
  return {
    ...(typeof query === "string" ? { query } : {}),
    ...(typeof schemaId === "number" ? { schemaId } : {}),
  };
}

/**
 * Wraps an envelope into the MCP `CallToolResult`: the JSON text on the
 * content channel, the same object under `structuredContent`, and `isError`
 * set for every non-success status.
 */
export function toCallToolResult(envelope: ToolEnvelope): CallToolResult & { structuredContent: ToolEnvelope } {
  return {
    isError: envelope.status !== "success",
    content: [{ type: "text", text: JSON.stringify(envelope) }],
    structuredContent: envelope,
  };
}

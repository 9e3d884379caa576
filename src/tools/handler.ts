import type { DispatchRequest, RequestDispatcher } from "../backend/dispatcher.js";
import { GatewayError, TransportError, ValidationError } from "../backend/errors.js";
import { resolveRoutePath } from "../backend/routes.js";
import { collectChunks } from "../backend/stream.js";
import { runWithInvocationContext } from "../infra/invocationContext.js";
import type { StructuredLogger } from "../logger.js";
import { type CatalogTool, type ToolPlan, TOOL_CATALOG } from "./catalog.js";
import { classifyFailure } from "./classifier.js";
import {
  type EnvelopeEcho,
  type ToolEnvelope,
  extractEcho,
  failureEnvelope,
  successEnvelope,
} from "./envelope.js";
import { runHealthCheck } from "./healthCheck.js";

export interface ToolInvocationHandlerOptions {
  readonly dispatcher: Pick<RequestDispatcher, "send">;
  /** End-to-end deadline of a tool call unless the catalogue entry sets its own. */
  readonly requestTimeoutMs: number;
  /** Values scrubbed from every caller-visible message (client secret, issued tokens). */
  readonly secrets: () => Iterable<string>;
  readonly serverName: string;
  readonly catalog?: readonly CatalogTool[];
  readonly logger?: StructuredLogger;
}

/** Correlation data and cancellation supplied by the transport. */
export interface InvocationOptions {
  readonly requestId?: string | number | null;
  readonly transport?: string;
  readonly signal?: AbortSignal;
}

/** Parses a streamed body as JSON, falling back to the raw text. */
export function parseStreamedBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return { text };
  }
}

/**
 * Entry point of every tool call: validates arguments against the catalogue,
 * dispatches the backend call under an end-to-end deadline and folds any
 * outcome into a {@link ToolEnvelope}. It never throws.
 */
export class ToolInvocationHandler {
  private readonly dispatcher: Pick<RequestDispatcher, "send">;
  private readonly requestTimeoutMs: number;
  private readonly secrets: () => Iterable<string>;
  private readonly serverName: string;
  private readonly tools: ReadonlyMap<string, CatalogTool>;
  private readonly logger?: StructuredLogger;

  constructor(options: ToolInvocationHandlerOptions) {
    this.dispatcher = options.dispatcher;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.secrets = options.secrets;
    this.serverName = options.serverName;
    this.tools = new Map((options.catalog ?? TOOL_CATALOG).map((tool) => [tool.name, tool]));
    this.logger = options.logger;
  }

  /** Catalogue entries in listing order. */
  listTools(): CatalogTool[] {
    return Array.from(this.tools.values());
  }

  invoke(name: string, args: unknown, options: InvocationOptions = {}): Promise<ToolEnvelope> {
    return runWithInvocationContext(
      { tool: name, requestId: options.requestId, transport: options.transport },
      () => this.invokeInContext(name, args, options.signal),
    );
  }

  private async invokeInContext(name: string, args: unknown, signal: AbortSignal | undefined): Promise<ToolEnvelope> {
    const echo = extractEcho(args);
    const tool = this.tools.get(name);
    if (!tool) {
      this.logger?.warn("tool_unknown", { name });
      return failureEnvelope("validation_error", `Unknown tool: ${name}`, echo);
    }

    const preparation = tool.prepare(args);
    if (!preparation.ok) {
      const issue = preparation.error.issues[0];
      return this.fail(new ValidationError(issue?.message, { cause: preparation.error }), echo, 0);
    }

    const startedAt = Date.now();
    this.logger?.debug("tool_invocation_started");
    try {
      const envelope = await this.withDeadline(tool.timeoutMs ?? this.requestTimeoutMs, signal, (callSignal, timeoutMs) =>
        this.execute(preparation.plan, timeoutMs, callSignal),
      );
      this.logger?.info("tool_invocation_completed", { status: envelope.status, duration_ms: Date.now() - startedAt });
      return envelope;
    } catch (error) {
      return this.fail(error, echo, Date.now() - startedAt);
    }
  }

  /**
   * Runs {@link task} with a signal that aborts when the deadline elapses or
   * the caller cancels. The returned promise settles at the deadline even if
   * the task ignores its signal.
   */
  private async withDeadline<T>(
    timeoutMs: number,
    parent: AbortSignal | undefined,
    task: (signal: AbortSignal, timeoutMs: number) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort();
    if (parent?.aborted) {
      controller.abort();
    } else {
      parent?.addEventListener("abort", onParentAbort, { once: true });
    }
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TransportError(`Request timed out after ${timeoutMs}ms`, "timeout"));
        controller.abort();
      }, timeoutMs);
    });
    try {
      return await Promise.race([task(controller.signal, timeoutMs), expiry]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  }

  private async execute(plan: ToolPlan, timeoutMs: number, signal: AbortSignal): Promise<ToolEnvelope> {
    if (plan.kind === "health") {
      const report = await runHealthCheck(
        {
          dispatcher: this.dispatcher,
          serverName: this.serverName,
          timeoutMs: Math.min(plan.checkTimeoutMs, timeoutMs),
          secrets: this.secrets,
        },
        signal,
      );
      return successEnvelope(report);
    }

    const request: DispatchRequest = {
      method: plan.route.method,
      path: resolveRoutePath(plan.route),
      payload: plan.route.payload,
      responseType: plan.route.responseType,
      timeoutMs,
      signal,
    };
    const outcome = await this.dispatcher.send(request);
    if (!outcome.ok) {
      throw outcome.error;
    }
    if (outcome.body.kind === "json") {
      return successEnvelope(outcome.body.value);
    }
    const text = await collectChunks(outcome.body.chunks);
    return successEnvelope(parseStreamedBody(text));
  }

  private fail(error: unknown, echo: EnvelopeEcho, durationMs: number): ToolEnvelope {
    const { status, message } = classifyFailure(error, this.secrets());
    this.logger?.warn("tool_invocation_failed", {
      status,
      category: error instanceof GatewayError ? error.category : null,
      http_status: error instanceof GatewayError ? error.httpStatus : null,
      message,
      duration_ms: durationMs,
    });
    return failureEnvelope(status, message, echo);
  }
}

import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

import { getInvocationContext } from "./infra/invocationContext.js";

/** Placeholder inserted wherever a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values never reach a log line while redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "accesstoken",
  "refresh_token",
  "cookie",
  "set-cookie",
  "secret",
  "client_id",
  "clientid",
  "client_secret",
  "password",
]);

const LEVEL_WEIGHT = { debug: 10, info: 20, warn: 30, error: 40 } as const;

export type LogLevel = keyof typeof LEVEL_WEIGHT;

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Parses `MCP_LOG_REDACT`. Directives are comma-separated: toggles such as
 * `on`/`off` plus literal substrings that must be scrubbed from every entry.
 * Without an explicit toggle, redaction stays enabled.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: string[];
} {
  const directives = (raw ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled = true;
  const tokens: string[] = [];
  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }
  return { enabled, tokens: Array.from(new Set(tokens)) };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB
const DEFAULT_MAX_FILE_COUNT = 5;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  request_id?: string | number | null;
  tool?: string;
  transport?: string;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. */
  readonly level?: LogLevel;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files retained, the active one included. */
  readonly maxFileCount?: number;
  /** Literal substrings scrubbed from messages and payload strings. */
  readonly redactSecrets?: readonly string[];
  /** Overrides the sensitive-key toggle parsed from `MCP_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Where JSON lines are written; defaults to stderr since stdout carries stdio MCP frames. */
  readonly stream?: { write(chunk: string): unknown };
  readonly onEntry?: (entry: LogEntry) => void;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Structured logger emitting JSON lines and optionally mirroring them to a
 * rotated file. File writes are queued sequentially to keep ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly minLevel: LogLevel;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly secrets = new Set<string>();
  private readonly redactionEnabled: boolean;
  private readonly stream: { write(chunk: string): unknown };
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.minLevel = options.level ?? "info";
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.MCP_LOG_REDACT);
    this.registerSecrets([...directives.tokens, ...(options.redactSecrets ?? [])]);
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.stream = options.stream ?? process.stderr;
    this.entryListener = options.onEntry;
  }

  /**
   * Adds literal values (client secrets, bearer tokens) that must never appear
   * in an emitted entry. Blank values are ignored.
   */
  registerSecrets(values: Iterable<string>): void {
    for (const value of values) {
      const trimmed = value.trim();
      if (trimmed.length > 0) {
        this.secrets.add(trimmed);
      }
    }
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Waits for pending file writes. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.minLevel]) {
      return;
    }
    const context = getInvocationContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.scrub(message),
      ...(context?.requestId !== undefined ? { request_id: context.requestId } : {}),
      ...(context ? { tool: context.tool } : {}),
      ...(context?.transport !== undefined ? { transport: context.transport } : {}),
      ...(payload !== undefined ? { payload: this.sanitise(payload) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    if (this.logFile) {
      this.enqueueFileWrite(this.logFile, line);
    }
  }

  private enqueueFileWrite(logFile: string, line: string): void {
    this.writeQueue = this.writeQueue
      .then(async () => {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      })
      .catch((error: unknown) => {
        this.reportInternalFailure("log_file_write_failed", error);
        // Let the next write retry the directory creation.
        this.logDirectoryReady = false;
      });
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: { message: error instanceof Error ? error.message : String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private scrub(value: string): string {
    let sanitised = value;
    for (const secret of this.secrets) {
      sanitised = sanitised.split(secret).join(REDACTION_TOKEN);
    }
    return sanitised;
  }

  private sanitise(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitise(item));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrub(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] =
          this.redactionEnabled && SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.sanitise(entry);
      }
      return result;
    }
    return value;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

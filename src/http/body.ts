import type { IncomingMessage } from "node:http";
import { Buffer } from "node:buffer";

/** Raised when a request body exceeds the accepted size. */
export class PayloadTooLargeError extends Error {
  readonly status = 413;

  constructor(readonly limitBytes: number) {
    super("Payload Too Large");
    this.name = "PayloadTooLargeError";
  }
}

/** Structured JSON payload returned by {@link readJsonBody}. */
export interface JsonBody {
  readonly parsed: unknown;
  /** Number of bytes read from the underlying socket. */
  readonly bytes: number;
}

/**
 * Reads and parses a JSON payload from an {@link IncomingMessage} while
 * enforcing an upper bound on the number of bytes accepted. Throws
 * {@link PayloadTooLargeError} past the limit and a `SyntaxError` for
 * malformed JSON.
 */
export async function readJsonBody(req: IncomingMessage, maxBytes = 1 << 20): Promise<JsonBody> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += buffer.length;
    if (totalBytes > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    buffers.push(buffer);
  }

  const parsed: unknown = JSON.parse(Buffer.concat(buffers).toString("utf8"));
  return { parsed, bytes: totalBytes };
}

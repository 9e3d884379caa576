import type { ReadableStream } from "node:stream/web";

/**
 * Lazy, finite sequence of decoded text chunks read from a response body.
 * The sequence belongs to a single call: once it finishes, fails or is
 * closed, the underlying reader is cancelled and {@link onSettled} runs.
 */
export interface ChunkStream extends AsyncIterable<string> {
  /** Stops reading and releases the connection. Safe to call repeatedly. */
  close(): Promise<void>;
}

export interface ChunkStreamOptions {
  /** Maps read failures (aborts included) into the caller's error model. */
  readonly mapError: (error: unknown) => unknown;
  /** Invoked exactly once when the stream settles. */
  readonly onSettled: () => void;
}

/** Wraps {@link body} in a {@link ChunkStream}; a `null` body yields no chunks. */
export function createChunkStream(
  body: ReadableStream<Uint8Array> | null,
  options: ChunkStreamOptions,
): ChunkStream {
  const reader = body?.getReader() ?? null;
  let settled = false;

  const settle = async (cancel: boolean): Promise<void> => {
    if (settled) {
      return;
    }
    settled = true;
    try {
      if (reader && cancel) {
        await reader.cancel();
      }
    } catch {
      // The reader is already errored (typically by the abort that ended the call).
    } finally {
      reader?.releaseLock();
      options.onSettled();
    }
  };

  async function* iterate(): AsyncGenerator<string, void, undefined> {
    if (!reader) {
      await settle(false);
      return;
    }
    const decoder = new TextDecoder();
    let completed = false;
    try {
      while (true) {
        const result = await reader.read().catch((error: unknown) => {
          throw options.mapError(error);
        });
        if (result.done) {
          completed = true;
          const tail = decoder.decode();
          if (tail.length > 0) {
            yield tail;
          }
          return;
        }
        const text = decoder.decode(result.value, { stream: true });
        if (text.length > 0) {
          yield text;
        }
      }
    } finally {
      await settle(!completed);
    }
  }

  const iterator = iterate();
  return {
    [Symbol.asyncIterator]: () => iterator,
    close: async () => {
      // Cancelling first resolves a read that is still pending, which lets the
      // generator reach its return.
      await settle(true);
      await iterator.return(undefined);
    },
  };
}

/** Drains {@link stream} into a single string. */
export async function collectChunks(stream: ChunkStream): Promise<string> {
  let text = "";
  try {
    for await (const chunk of stream) {
      text += chunk;
    }
  } finally {
    await stream.close();
  }
  return text;
}

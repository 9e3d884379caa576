import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Correlation details of the tool invocation currently executing. The logger
 * reads them so entries emitted deep inside the dispatcher still name the
 * tool and request they belong to.
 */
export interface InvocationContext {
  readonly tool: string;
  readonly requestId?: string | number | null;
  /** Logical transport tag ("stdio", "http", "memory", …). */
  readonly transport?: string;
}

const storage = new AsyncLocalStorage<InvocationContext>();

/** Runs {@link callback} with {@link context} visible to nested async work. */
export function runWithInvocationContext<T>(context: InvocationContext, callback: () => T): T {
  return storage.run(context, callback);
}

/**
 * Runs {@link callback} with no invocation context, for work shared between
 * several invocations.
 */
export function runOutsideInvocationContext<T>(callback: () => T): T {
  return storage.exit(callback);
}

/** Retrieves the context of the current async execution, if any. */
export function getInvocationContext(): InvocationContext | undefined {
  return storage.getStore();
}

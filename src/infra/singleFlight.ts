/**
 * Coordinates a single in-flight execution of an asynchronous operation.
 *
 * The first caller starts the factory; every caller arriving while it runs
 * awaits the same promise and observes the same outcome, success or failure.
 * Once the flight settles the slot is released so the next caller starts a
 * fresh execution; failures are never memoised.
 */
export class SingleFlight<T> {
  private inflight: Promise<T> | null = null;

  /** Whether an execution is currently in progress. */
  get active(): boolean {
    return this.inflight !== null;
  }

  /** Joins the current flight or starts a new one with {@link factory}. */
  run(factory: () => Promise<T>): Promise<T> {
    if (this.inflight) {
      return this.inflight;
    }
    // The factory is deferred to a microtask so a synchronous throw still
    // settles through the promise and releases the slot.
    const flight: Promise<T> = Promise.resolve()
      .then(factory)
      .finally(() => {
        if (this.inflight === flight) {
          this.inflight = null;
        }
      });
    this.inflight = flight;
    return flight;
  }
}

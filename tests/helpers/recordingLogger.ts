import { StructuredLogger, type LogEntry, type LogLevel } from "../../src/logger.js";

/**
 * Logger capturing every structured entry in memory. Entries go through the
 * production sanitisation (redaction included) so assertions observe exactly
 * what would reach stderr, while nothing is actually written.
 */
export class RecordingLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(options: { level?: LogLevel; redactSecrets?: readonly string[] } = {}) {
    const entries: LogEntry[] = [];
    super({
      level: options.level ?? "debug",
      redactSecrets: options.redactSecrets,
      redactionEnabled: true,
      stream: { write: () => true },
      onEntry: (entry) => {
        entries.push(entry);
      },
    });
    this.entries = entries;
  }

  /** Messages of the captured entries, in emission order. */
  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  /** Serialised entries, for "never leaks" assertions. */
  dump(): string {
    return this.entries.map((entry) => JSON.stringify(entry)).join("\n");
  }
}

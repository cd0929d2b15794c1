import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  maxBuffer?: number | undefined;
}

/**
 * Sink base that queues entries and drains them on the next macrotask.
 *
 * A queue that reaches `maxBuffer` is drained synchronously; entries are
 * never dropped. Subclasses implement `writeEntry(entry)` and may override
 * `writeBatch(entries)` to emit a whole drain at once.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private drainScheduled = false;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = Math.max(1, options?.maxBuffer ?? 1000);
  }

  protected abstract writeEntry(entry: LogEntry): void;

  protected writeBatch(entries: readonly LogEntry[]): void {
    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }

  write(entry: LogEntry): void {
    this.pending.push(entry);

    if (this.pending.length >= this.maxBuffer) {
      this.drain();
      return;
    }

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => {
        this.drainScheduled = false;
        this.drain();
      });
    }
  }

  /** Write everything still queued. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.pending;
    if (entries.length === 0) return;
    this.pending = [];
    this.writeBatch(entries);
  }
}

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
}

function formatJsonLine(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    category: entry.category,
    msg: entry.msg,
    ...(entry.context ? { context: entry.context } : {}),
  });
}

/**
 * JSON-lines log file (`REFDATA_LOG_FILE`). Each drain is appended with a
 * single write; the parent directory is created on construction.
 */
export class FileSink extends BufferedSink {
  private readonly path: string;

  constructor(options: FileSinkOptions) {
    super(options);
    mkdirSync(dirname(options.path), { recursive: true });
    this.path = options.path;
  }

  protected override writeEntry(entry: LogEntry): void {
    this.writeBatch([entry]);
  }

  protected override writeBatch(entries: readonly LogEntry[]): void {
    const lines = entries.map((entry) => `${formatJsonLine(entry)}\n`).join('');
    appendFileSync(this.path, lines, 'utf8');
  }
}

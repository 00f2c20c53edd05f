import type { LogEntry } from "../types.js";
import { BoundedBuffer } from "../buffer/boundedBuffer.js";

export interface LogSink {
  write(entry: LogEntry): void;
}

/** Anything that accepts a line of text; `process.stdout` qualifies. */
export interface LineWriter {
  write(chunk: string): unknown;
}

export class ConsoleSink implements LogSink {
  write(entry: LogEntry) {
    const line = JSON.stringify(entry);
    // eslint-disable-next-line no-console
    if (entry.level === "warn" || entry.level === "error") console.error(line);
    // eslint-disable-next-line no-console
    else console.log(line);
  }
}

export class JSONLSink implements LogSink {
  constructor(private target: LineWriter = process.stdout) {}
  write(entry: LogEntry) {
    this.target.write(JSON.stringify(entry) + "\n");
  }
}

/** Keeps the most recent entries in memory; used by tests and diagnostics. */
export class RingBufferSink implements LogSink {
  private buf: BoundedBuffer<LogEntry>;
  constructor(capacity: number) {
    this.buf = new BoundedBuffer(capacity);
  }
  write(entry: LogEntry) {
    this.buf.push(entry);
  }
  entries() {
    return this.buf.toArray();
  }
  find(msg: string) {
    return this.buf.toArray().filter(e => e.msg === msg);
  }
}

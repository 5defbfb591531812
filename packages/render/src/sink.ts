import { closeSync, openSync, writeSync } from "node:fs";
import { Buffer } from "node:buffer";
import { ExportError } from "@inkframe/core";

/** Destination for an export pass. Writes are streamed, not transactional. */
export interface OutputSink {
  write(data: string | Uint8Array): void;
  close(): void;
}

/** Collects output in memory. */
export class BufferSink implements OutputSink {
  private chunks: Buffer[] = [];
  private length = 0;

  write(data: string | Uint8Array): void {
    const chunk = typeof data === "string" ? Buffer.from(data, "utf-8") : Buffer.from(data);
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  close(): void {}

  get byteLength(): number {
    return this.length;
  }

  toBytes(): Uint8Array {
    return new Uint8Array(Buffer.concat(this.chunks, this.length));
  }

  toString(): string {
    return Buffer.concat(this.chunks, this.length).toString("utf-8");
  }
}

/** Writes straight to a file descriptor. */
export class FileSink implements OutputSink {
  private fd: number | null;

  constructor(readonly path: string) {
    try {
      this.fd = openSync(path, "w");
    } catch (err) {
      throw new ExportError(`Cannot open "${path}" for writing`, { cause: err });
    }
  }

  write(data: string | Uint8Array): void {
    if (this.fd === null) {
      throw new ExportError(`Write to closed output "${this.path}"`);
    }
    const bytes = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
    try {
      let offset = 0;
      while (offset < bytes.length) {
        offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
      }
    } catch (err) {
      throw new ExportError(`Failed writing to "${this.path}"`, { cause: err });
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (err) {
      throw new ExportError(`Failed closing "${this.path}"`, { cause: err });
    }
  }
}

/**
 * Run `fn` against a sink and close it on every exit path.
 * A failure in `fn` takes precedence over a failure while closing.
 */
export function withSink<T>(sink: OutputSink, fn: (sink: OutputSink) => T): T {
  let result: T;
  try {
    result = fn(sink);
  } catch (err) {
    try {
      sink.close();
    } catch (closeErr) {
      throw new ExportError("Export failed and the output could not be closed", {
        cause: new AggregateError([err, closeErr]),
      });
    }
    throw err;
  }
  sink.close();
  return result;
}

import fs from "node:fs";
import { SinkOpenError, SinkWriteError } from "../utils/errors";
import { sinkLogger as logger } from "../utils/logger";

/**
 *  Where rendered lines end up.
 *    writeLine(line) – write `line` plus a newline; throws on failure
 *    close()         – release the destination, idempotent
 */
export interface LineSink {
  readonly name: string;
  writeLine(line: string): void;
  close(): void;
}

/** Somewhere text goes. `write` must throw when the text cannot be written. */
export interface TextStream {
  write(chunk: string): unknown;
}

export type WriteFn = (fd: number, buffer: Uint8Array, offset: number, length: number) => number;

const isAgain = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "EAGAIN";

/**
 * Write all of `text` to `fd`, continuing after short writes. A write that
 * makes no progress throws; EAGAIN from a non-blocking pipe is retried.
 */
export const writeFully = (fd: number, text: string, write: WriteFn = fs.writeSync): void => {
  const bytes = Buffer.from(text, "utf8");
  let offset = 0;
  while (offset < bytes.length) {
    let n: number;
    try {
      n = write(fd, bytes, offset, bytes.length - offset);
    } catch (error) {
      if (isAgain(error)) continue;
      throw error;
    }
    if (n <= 0) throw new Error(`Wrote ${offset} of ${bytes.length} bytes to fd ${fd}`);
    offset += n;
  }
};

/**
 * Synchronous stream over an inherited fd such as 1 or 2. Unlike
 * process.stdout, a failed write (EPIPE, ENOSPC) throws at the call site.
 */
export const fdStream = (fd: number): TextStream => ({
  write: (chunk: string) => writeFully(fd, chunk),
});

/** Writes to a TextStream such as fdStream(1); never closes it. */
export class StreamSink implements LineSink {
  readonly name: string;
  private readonly stream: TextStream;

  constructor(stream: TextStream, name: string = "stdout") {
    this.stream = stream;
    this.name = name;
  }

  writeLine(line: string) {
    this.stream.write(`${line}\n`);
  }

  close() {}
}

/** Appends to a file, creating it when absent. */
export class AppendFileSink implements LineSink {
  private fd: number | null;

  private constructor(readonly name: string, fd: number) {
    this.fd = fd;
  }

  static open(path: string): AppendFileSink {
    try {
      const fd = fs.openSync(path, "a");
      logger.debug({ path }, "Output file opened for append");
      return new AppendFileSink(path, fd);
    } catch (error) {
      throw new SinkOpenError(path, error);
    }
  }

  writeLine(line: string) {
    if (this.fd === null) throw new Error(`${this.name} is closed`);
    writeFully(this.fd, `${line}\n`);
  }

  close() {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }
}

/**
 * Best-effort write: a failing line is logged and reported through
 * `onLineError`, and the remaining lines are still attempted. Throws
 * SinkWriteError at the end if any line failed.
 */
export const writeLines = (
  sink: LineSink,
  lines: readonly string[],
  onLineError?: (error: unknown, index: number) => void
): void => {
  let failed = 0;
  let firstError: unknown;

  lines.forEach((line, index) => {
    try {
      sink.writeLine(line);
    } catch (error) {
      failed++;
      firstError ??= error;
      logger.warn({ err: error, sink: sink.name, line: index }, "Line write failed");
      onLineError?.(error, index);
    }
  });

  if (failed > 0) throw new SinkWriteError(failed, lines.length, firstError);
};

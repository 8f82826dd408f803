import fs from "node:fs";
import type { ByteSource } from "./byte-source";
import { SourceOpenError } from "../utils/errors";
import { sourceLogger as logger } from "../utils/logger";

export interface FileRange {
  /** First byte to read (inclusive). */
  start?: number;
  /** Byte to stop at (exclusive). */
  end?: number;
}

/**
 *  Blocking reads straight off a file descriptor, until a read returns 0.
 *  Without a range the fd is read sequentially, so pipes, character devices
 *  and files whose stat size is wrong (/proc) work too. A range switches to
 *  positioned reads over a slice of the file, so several counters can split
 *  one file and merge their tables afterwards.
 */
export class FileByteSource implements ByteSource {
  private fd: number | null;
  private pos = 0;

  private constructor(
    readonly path: string,
    fd: number,
    /** Offset of a positioned read, or null for sequential reads. */
    private readonly start: number | null,
    private readonly end: number | undefined,
    /** Expected length, for progress only. */
    readonly size: number | undefined
  ) {
    this.fd = fd;
  }

  /* ---------- factory: open and size the file up front ---------- */
  static open(path: string, range: FileRange = {}): FileByteSource {
    let fd: number;
    try {
      fd = fs.openSync(path, "r");
    } catch (error) {
      throw new SourceOpenError(path, error);
    }

    try {
      const stat = fs.fstatSync(fd);
      const ranged = range.start !== undefined || range.end !== undefined;
      const start = range.start ?? 0;

      let size: number | undefined;
      if (stat.isFile() && stat.size > 0) {
        size = Math.max(0, Math.min(range.end ?? stat.size, stat.size) - start);
      } else if (range.end !== undefined) {
        size = Math.max(0, range.end - start);
      }

      logger.debug({ path, fileSize: stat.size, start: range.start, end: range.end, size }, "File source opened");
      return new FileByteSource(path, fd, ranged ? start : null, range.end, size);
    } catch (error) {
      fs.closeSync(fd);
      throw new SourceOpenError(path, error);
    }
  }

  get position() { return this.pos; }

  read(buf: Uint8Array, offset: number, length: number): number {
    if (this.fd === null) throw new Error(`${this.path} is closed`);

    let count = length;
    if (this.end !== undefined) {
      count = Math.min(count, this.end - (this.start ?? 0) - this.pos);
      if (count <= 0) return 0;
    }

    const position = this.start === null ? null : this.start + this.pos;
    const n = fs.readSync(this.fd, buf, offset, count, position);
    this.pos += n;
    return n;
  }

  close() {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
    logger.debug({ path: this.path, bytesRead: this.pos }, "File source closed");
  }
}

import type { ByteSource } from "./byte-source";

/**
 *  Source over bytes already in memory, for tests and for callers that hold
 *  the data themselves. `maxRead` caps every read to simulate short reads.
 */
export class MemoryByteSource implements ByteSource {
  private readonly bytes: Uint8Array;
  private readonly maxRead: number;
  private pos = 0;

  constructor(bytes: Uint8Array, maxRead: number = Infinity) {
    this.bytes = bytes;
    this.maxRead = maxRead;
  }

  get position() { return this.pos; }
  get size() { return this.bytes.length; }

  read(buf: Uint8Array, offset: number, length: number): number {
    const count = Math.min(length, this.maxRead, this.bytes.length - this.pos);
    if (count <= 0) return 0;
    buf.set(this.bytes.subarray(this.pos, this.pos + count), offset);
    this.pos += count;
    return count;
  }

  close() {}
}

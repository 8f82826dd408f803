/**
 *  Anything the counter can drain.
 *    read(buf, off, len) – copy up to `len` bytes into `buf` at `off`,
 *                          returning how many were written (0 ⇒ end of source)
 *    position            – bytes handed out so far
 *    size                – total length when known up front (for progress)
 *    close()             – release the underlying handle, idempotent
 *
 *  Reads are blocking; a failing read throws and the source is unusable after.
 */
export interface ByteSource {
  readonly position: number;
  readonly size: number | undefined;

  read(buf: Uint8Array, offset: number, length: number): number;
  close(): void;
}

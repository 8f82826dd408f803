import { EventEmitter } from "events";
import type { ByteSource } from "../sources/byte-source";
import { BYTE_VALUES, CountTable } from "./count-table";
import { DEFAULT_CHUNK_SIZE } from "../config";
import { ConfigError, ReadError } from "../utils/errors";
import { counterLogger as logger, logPerformance } from "../utils/logger";

export interface ChunkTick { index: number; length: number; bytesRead: number; }

export interface CountResult {
  table: CountTable;
  totalBytes: number;
  chunks: number;
}

export type CounterState = "idle" | "reading" | "exhausted" | "failed";

interface CounterEvents {
  chunk: [tick: ChunkTick];
  done: [result: CountResult];
}

/**
 * Drains a ByteSource through one fixed-size buffer, tallying every byte.
 * Emits "chunk" after each chunk is counted and "done" with the result.
 */
export class ChunkedCounter extends EventEmitter<CounterEvents> {
  readonly capacity: number;
  private readonly buffer: Uint8Array;
  private _state: CounterState = "idle";

  constructor(capacity: number = DEFAULT_CHUNK_SIZE) {
    super();
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new ConfigError(`Chunk capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Uint8Array(capacity);

    logger.debug({ capacity }, "ChunkedCounter initialized");
  }

  get state(): CounterState { return this._state; }

  /**
   * Read `source` to the end and return its byte counts. A failing read
   * throws ReadError and nothing counted so far is returned.
   */
  consumeAll(source: ByteSource): CountResult {
    if (this._state === "reading") throw new Error("ChunkedCounter is already reading");

    const startTime = Date.now();
    const counts = new Float64Array(BYTE_VALUES);
    let bytesRead = 0;
    let chunks = 0;
    this._state = "reading";

    try {
      for (;;) {
        let length: number;
        try {
          length = source.read(this.buffer, 0, this.capacity);
        } catch (error) {
          logger.debug({ err: error, bytesRead, chunks }, "Read failed mid-stream");
          throw new ReadError(bytesRead, error);
        }
        if (length === 0) break;

        const chunk = this.buffer.subarray(0, length);
        for (let i = 0; i < chunk.length; i++) counts[chunk[i]]++;

        bytesRead += length;
        this.emit("chunk", { index: chunks, length, bytesRead });
        chunks++;

        logger.trace({ chunk: chunks, length, bytesRead }, "Chunk counted");
      }
    } catch (error) {
      // includes a throwing "chunk" listener
      this._state = "failed";
      throw error;
    }

    this._state = "exhausted";
    const result: CountResult = { table: CountTable.fromCounts(counts), totalBytes: bytesRead, chunks };

    logPerformance(logger, "count", startTime, { totalBytes: bytesRead, chunks });
    this.emit("done", result);
    return result;
  }
}

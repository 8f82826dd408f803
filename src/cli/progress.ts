import type { ChunkedCounter } from "../core/chunked-counter";
import type { TextStream } from "../sinks/line-sink";

/**
 * Draws `processed chunk N / M` on one line while the counter runs and
 * `done!` when it finishes. M is "?" when the source size is unknown.
 */
export const attachProgress = (
  counter: ChunkedCounter,
  stream: TextStream,
  sourceSize: number | undefined
): void => {
  const total = sourceSize === undefined ? "?" : String(Math.ceil(sourceSize / counter.capacity));

  counter.on("chunk", ({ index }) => {
    stream.write(`\rprocessed chunk ${index + 1} / ${total}`);
  });
  counter.on("done", () => {
    stream.write("\ndone!\n");
  });
};

import { ChunkedCounter } from "../core/chunked-counter";
import { formatTable } from "../core/table-renderer";
import { FileByteSource } from "../sources/file-byte-source";
import { AppendFileSink, StreamSink, writeLines, type LineSink, type TextStream } from "../sinks/line-sink";
import { loadConfig, type Env } from "../config";
import { parseArgs, USAGE } from "./args";
import { attachProgress } from "./progress";
import { ExitCode, FreqsError, UsageError, exitCodeFor } from "../utils/errors";
import { cliLogger as logger, logError, logPerformance } from "../utils/logger";

export interface CliIO {
  stdout: TextStream;
  stderr: TextStream;
  env: Env;
  /** Whether stderr is a terminal; the default for progress output. */
  interactive: boolean;
}

const describe = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** Report to the user; a stream that cannot take it only gets logged. */
const tell = (stream: TextStream, text: string) => {
  try {
    stream.write(text);
  } catch (error) {
    logError(logger, error, { context: "report", text });
  }
};

/**
 * Run one invocation and return its exit status. This is the only error
 * boundary: nothing thrown below escapes, every failure becomes a short
 * message and an exit code.
 */
export const runCli = (argv: readonly string[], io: CliIO): ExitCode => {
  const startTime = Date.now();

  try {
    const command = parseArgs(argv);
    if (command.kind === "help") {
      io.stdout.write(`${USAGE}\n`);
      return ExitCode.OK;
    }

    const config = loadConfig(io.env, io.interactive);
    const chunkSize = command.chunkSize ?? config.chunkSize;
    const showProgress = config.progress && !command.quiet;

    logger.info({ inPath: command.inPath, outPath: command.outPath, chunkSize }, "Starting analysis");

    // open both ends before the (possibly long) count
    const source = FileByteSource.open(command.inPath);
    let sink: LineSink | undefined;
    try {
      sink = command.outPath === undefined ? new StreamSink(io.stdout) : AppendFileSink.open(command.outPath);

      const counter = new ChunkedCounter(chunkSize);
      if (showProgress) attachProgress(counter, io.stderr, source.size);
      const result = counter.consumeAll(source);
      source.close();

      writeLines(sink, formatTable(result.table), (error, index) => {
        tell(io.stderr, `Could not write line ${index}: ${describe(error)}\n`);
      });

      logPerformance(logger, "freqs", startTime, {
        totalBytes: result.totalBytes,
        distinctBytes: result.table.distinct,
        chunks: result.chunks,
      });
    } finally {
      source.close();
      sink?.close();
    }

    return ExitCode.OK;
  } catch (error) {
    if (error instanceof UsageError) {
      tell(io.stdout, `${error.message}\n`);
      logger.debug({ err: error }, "Usage error");
    } else if (error instanceof FreqsError) {
      tell(io.stderr, `Error: ${error.message}\nAborting\n`);
      logger.debug({ err: error, cause: error.cause }, "Run aborted");
    } else {
      tell(io.stderr, `Error: ${describe(error)}\nAborting\n`);
      logError(logger, error, { context: "unexpected-failure" });
    }
    return exitCodeFor(error);
  }
};

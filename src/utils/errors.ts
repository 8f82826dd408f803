// src/utils/errors.ts

/** Process exit statuses, following the BSD sysexits.h numbering. */
export const ExitCode = {
  OK: 0,
  USAGE: 64,
  NO_INPUT: 66,
  SOFTWARE: 70,
  CANT_CREATE: 73,
  IO_ERR: 74,
  CONFIG: 78,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Base class for every failure the tool reports to the user.
 * `message` is shown verbatim; `cause` carries the underlying error for logs.
 */
export abstract class FreqsError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UsageError extends FreqsError {
  readonly exitCode = ExitCode.USAGE;
}

export class ConfigError extends FreqsError {
  readonly exitCode = ExitCode.CONFIG;
}

export class SourceOpenError extends FreqsError {
  readonly exitCode = ExitCode.NO_INPUT;

  constructor(readonly path: string, cause?: unknown) {
    super(`Could not open file. Bad file or path? (${path})`, { cause });
  }
}

/** A read failed part way through the source; the partial count is discarded. */
export class ReadError extends FreqsError {
  readonly exitCode = ExitCode.IO_ERR;

  constructor(readonly offset: number, cause?: unknown) {
    super(`Read failed at byte ${offset}`, { cause });
  }
}

export class SinkOpenError extends FreqsError {
  readonly exitCode = ExitCode.CANT_CREATE;

  constructor(readonly path: string, cause?: unknown) {
    super(`Could not open output file ${path}`, { cause });
  }
}

export class SinkWriteError extends FreqsError {
  readonly exitCode = ExitCode.IO_ERR;

  constructor(readonly failedLines: number, readonly totalLines: number, cause?: unknown) {
    super(`Failed to write ${failedLines} of ${totalLines} lines`, { cause });
  }
}

/** Exit status for anything thrown out of a run. */
export const exitCodeFor = (error: unknown): ExitCode =>
  error instanceof FreqsError ? error.exitCode : ExitCode.SOFTWARE;

// src/config.ts
import { ConfigError } from "./utils/errors";

/** Default read buffer: 128 KiB. */
export const DEFAULT_CHUNK_SIZE = 128 * 1024;

export interface FreqsConfig {
  /** Bytes requested per read. */
  chunkSize: number;
  /** Whether to draw the chunk progress line on stderr. */
  progress: boolean;
}

export type Env = Record<string, string | undefined>;

/** Parse a positive integer byte count; `name` is only used in the error. */
export const parseChunkSize = (raw: string, name: string): number => {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const parseBoolean = (raw: string, name: string): boolean => {
  switch (raw.trim().toLowerCase()) {
    case "1": case "true": case "yes": case "on": return true;
    case "0": case "false": case "no": case "off": return false;
    default:
      throw new ConfigError(`${name} must be true or false, got "${raw}"`);
  }
};

/**
 * Runtime config (ENV-driven). `interactive` is the default for progress
 * when FREQS_PROGRESS is unset, normally whether stderr is a TTY.
 */
export const loadConfig = (env: Env, interactive: boolean): FreqsConfig => {
  const chunkSize = env.FREQS_CHUNK_SIZE === undefined
    ? DEFAULT_CHUNK_SIZE
    : parseChunkSize(env.FREQS_CHUNK_SIZE, "FREQS_CHUNK_SIZE");

  const progress = env.FREQS_PROGRESS === undefined
    ? interactive
    : parseBoolean(env.FREQS_PROGRESS, "FREQS_PROGRESS");

  return { chunkSize, progress };
};

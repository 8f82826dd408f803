import { parseChunkSize } from "../config";
import { UsageError } from "../utils/errors";

export const USAGE = `
Usage:
    freqs <path to file>
        performs analysis on target file,
        then prints results as stdout.

    freqs <path to target file> -o <outfile>
        performs analysis on target file,
        then appends results to outfile. if
        o flag is specified with no outfile,
        prints to stdout instead.

Options:
    -c, --chunk-size <bytes>   bytes read per chunk (default 131072)
    -q, --quiet                no progress output
    -h, --help                 show this text

Environment:
    FREQS_CHUNK_SIZE, FREQS_PROGRESS, LOG_LEVEL
`;

export const MISSING_INPUT = "Not enough arguments. try passing -h";

export type CliCommand =
  | { kind: "help" }
  | { kind: "count"; inPath: string; outPath?: string; chunkSize?: number; quiet: boolean };

/** Parse everything after the script name. `-h` anywhere wins. */
export const parseArgs = (argv: readonly string[]): CliCommand => {
  if (argv.some(arg => arg === "-h" || arg === "--help")) return { kind: "help" };

  let inPath: string | undefined;
  let outPath: string | undefined;
  let chunkSize: number | undefined;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-o":
        // a trailing -o leaves output on stdout
        if (i + 1 < argv.length) outPath = argv[++i];
        break;
      case "-c":
      case "--chunk-size": {
        const value = argv[++i];
        if (value === undefined) throw new UsageError(`${arg} needs a value`);
        try {
          chunkSize = parseChunkSize(value, arg);
        } catch (error) {
          throw new UsageError(error instanceof Error ? error.message : String(error));
        }
        break;
      }
      case "-q":
      case "--quiet":
        quiet = true;
        break;
      default:
        if (arg.length > 1 && arg.startsWith("-")) throw new UsageError(`Unknown option ${arg}. try passing -h`);
        inPath = arg;
    }
  }

  if (inPath === undefined) throw new UsageError(MISSING_INPUT);
  return { kind: "count", inPath, outPath, chunkSize, quiet };
};

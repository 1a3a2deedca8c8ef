/**
 * Line-oriented logging used by the trainer, the CLI and the debug dump.
 *
 * Verbose output is opt-in through `VERBOSE=true`, the same switch the test
 * helpers use, so a default run only prints progress lines.
 * @public
 */

export type LogSink = (line: string) => void;

export interface Logger {
  /** Always written. */
  info(line: string): void;
  /** Written only when the logger is verbose. */
  debug(line: string): void;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

export function isVerboseEnv(): boolean {
  return process.env.VERBOSE === 'true';
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const sink: LogSink = opts.sink ?? ((line) => console.log(line));
  const verbose = opts.verbose ?? isVerboseEnv();
  return {
    verbose,
    info: (line) => sink(line),
    debug: (line) => {
      if (verbose) sink(line);
    },
  };
}

/**
 * Package-wide default logger.
 * @public
 */
export const logger: Logger = createLogger();

import { dim, red, yellow } from './ui/colors';

export interface Logger {
  debug(msg: string, ...rest: unknown[]): void;
  info(msg: string, ...rest: unknown[]): void;
  warn(msg: string, ...rest: unknown[]): void;
  error(msg: string, ...rest: unknown[]): void;
}

/**
 * Console-backed logger. `quiet` drops info/debug output, `verbose` turns on
 * debug. Warnings and errors always go to stderr.
 */
export function createLogger({
  quiet = false,
  verbose = false,
}: { quiet?: boolean; verbose?: boolean } = {}): Logger {
  return {
    debug: (msg, ...rest) => {
      if (verbose) console.log(dim(msg), ...rest);
    },
    info: (msg, ...rest) => {
      if (!quiet) console.log(msg, ...rest);
    },
    warn: (msg, ...rest) => console.warn(yellow(msg), ...rest),
    error: (msg, ...rest) => console.error(red(msg), ...rest),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const defaultLogger: Logger = createLogger();

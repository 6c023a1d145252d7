import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Print debug lines (default: false) */
  verbose?: boolean;
}

let globalVerbose = false;

/**
 * Turn debug output on or off for every logger created without an explicit
 * `verbose` option. The CLI flips this from `--verbose`.
 */
export function setVerbose(verbose: boolean): void {
  globalVerbose = verbose;
}

/**
 * Create a console logger whose lines carry a `[Scope]` prefix, matching the
 * `[Local] ✓ Generated: ...` style of the CLI output.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  const isVerbose = () => options.verbose ?? globalVerbose;

  return {
    debug(message) {
      if (isVerbose()) {
        console.log(chalk.gray(`${prefix} ${message}`));
      }
    },
    info(message) {
      console.log(`${chalk.cyan(prefix)} ${message}`);
    },
    warn(message) {
      console.warn(chalk.yellow(`${prefix} ⚠ ${message}`));
    },
    error(message) {
      console.error(chalk.red(`${prefix} ✗ ${message}`));
    },
  };
}

/** Logger that discards everything; handy in tests and library use. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

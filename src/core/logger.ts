// ═══════════════════════════════════════════════════════════
// TERMSAGE — Logger
// Tagged console output; debug lines only in verbose mode
// ═══════════════════════════════════════════════════════════

import chalk from 'chalk';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Create a logger for one component. Every line is prefixed with
 * `[Tag]` and goes to stderr, so stdout carries only user-facing output.
 */
export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (!options.verbose) return;
      console.error(chalk.cyan(prefix), chalk.dim(message), ...details);
    },
    info(message, ...details) {
      console.error(chalk.blue(prefix), message, ...details);
    },
    warn(message, ...details) {
      console.error(chalk.yellow(prefix), message, ...details);
    },
    error(message, ...details) {
      console.error(chalk.red(prefix), message, ...details);
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

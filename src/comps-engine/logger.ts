// ── Console Logger ──────────────────────────────────────────────────
//
// Prefixed, colored console output for the CLI. Every line is also kept
// so --write can persist exactly what was shown.

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export interface ConsoleLogger extends Logger {
  /** Plain text of everything logged so far (no color codes). */
  readonly lines: readonly string[];
  /** Unprefixed report line. */
  line(text?: string): void;
}

export function createConsoleLogger(prefix: string, opts: { verbose?: boolean } = {}): ConsoleLogger {
  const lines: string[] = [];
  const tag = `[${prefix}]`;

  return {
    lines,
    line(text = '') {
      console.log(text);
      lines.push(text);
    },
    info(message) {
      console.log(`${chalk.cyan(tag)} ${message}`);
      lines.push(`${tag} ${message}`);
    },
    warn(message) {
      console.warn(chalk.yellow(`${tag} WARNING: ${message}`));
      lines.push(`${tag} WARNING: ${message}`);
    },
    error(message) {
      console.error(chalk.red(`${tag} ERROR: ${message}`));
      lines.push(`${tag} ERROR: ${message}`);
    },
    debug(message) {
      if (!opts.verbose) return;
      console.log(chalk.gray(`${tag} ${message}`));
      lines.push(`${tag} ${message}`);
    },
  };
}

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console logger. Warnings and errors carry a red WARNING/ERROR prefix.
 */
export function createConsoleLogger(): Logger {
  return {
    info(message) {
      // eslint-disable-next-line no-console
      console.log(message);
    },
    warn(message) {
      // eslint-disable-next-line no-console
      console.log(`${chalk.red('WARNING')} ${message}`);
    },
    error(message) {
      // eslint-disable-next-line no-console
      console.error(`${chalk.red('ERROR')} ${message}`);
    }
  };
}

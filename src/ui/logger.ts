import { log } from '@clack/prompts';
import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  step(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
  debug(message: string): void;
}

export function createLogger(opts?: { verbose?: boolean }): Logger {
  const verbose = opts?.verbose ?? false;
  return {
    info: (message) => log.info(message),
    step: (message) => log.step(message),
    warn: (message) => log.warn(chalk.yellow(message)),
    error: (message) => log.error(chalk.red(message)),
    success: (message) => log.success(chalk.green(message)),
    debug: (message) => {
      if (verbose) log.message(chalk.dim(message));
    },
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  info: noop,
  step: noop,
  warn: noop,
  error: noop,
  success: noop,
  debug: noop,
};

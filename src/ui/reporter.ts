import chalk from 'chalk';
import { TranslationError } from '../errors.js';
import type { Logger } from './logger.js';

const KIND_LABELS: Record<TranslationError['kind'], string> = {
  grammar: 'Invalid syntax',
  'missing-reference': 'Missing reference',
  'missing-field': 'Missing field',
  'extends-cycle': 'Extends cycle',
};

export function formatLocation(error: TranslationError): string | undefined {
  const { location } = error;
  if (!location) return undefined;
  return location.line === undefined ? location.file : `${location.file}:${location.line}`;
}

/** One-line rendering of a translation failure, location first when known. */
export function formatError(error: TranslationError): string {
  const loc = formatLocation(error);
  const prefix = loc ? `${loc}: ` : '';
  return `${prefix}${KIND_LABELS[error.kind]}: ${error.message}`;
}

export function reportError(err: unknown, logger: Logger): void {
  if (err instanceof TranslationError) {
    logger.error(formatError(err));
    return;
  }
  logger.error(err instanceof Error ? err.message : String(err));
}

/** Show a synthesized command line; on dry runs it goes to stdout so it can be piped. */
export function printCommand(argv: string[], opts: { dryRun: boolean; logger: Logger }): void {
  const line = argv.join(' ');
  if (opts.dryRun) {
    console.log(line);
  } else {
    opts.logger.step(chalk.cyan(`$ ${line}`));
  }
}

import { posix, relative, resolve } from 'node:path';
import type { CliOptions } from '../types/index.js';
import { MissingReferenceError, TranslationError } from '../errors.js';
import { findDockerfile } from '../discovery.js';
import { readDockerfile } from '../parsers/dockerfile.js';
import { renderDefinition, writeDefinitionFile } from '../writers/definition.js';
import { createLogger } from '../ui/logger.js';
import { reportError } from '../ui/reporter.js';

export interface ConvertOptions extends CliOptions {
  output?: string;
}

/**
 * Translate a single Dockerfile into a definition file. Without `-o` the
 * definition goes to stdout.
 */
export async function convertCommand(
  opts: ConvertOptions,
  dockerfile?: string,
  cwd: string = process.cwd(),
): Promise<number> {
  const logger = createLogger({ verbose: opts.verbose });

  try {
    let path = dockerfile;
    if (path === undefined) {
      const found = findDockerfile(cwd);
      if (!found) throw new MissingReferenceError(`No Dockerfile found in ${cwd}`);
      path = relative(cwd, found);
    }
    const recipe = readDockerfile(path, { logger, context: posix.dirname(path), cwd });

    if (opts.output === undefined) {
      process.stdout.write(renderDefinition(recipe));
      return 0;
    }
    writeDefinitionFile(recipe, resolve(cwd, opts.output));
    logger.success(`Wrote ${opts.output}`);
    return 0;
  } catch (err) {
    if (!(err instanceof TranslationError)) throw err;
    reportError(err, logger);
    return 1;
  }
}

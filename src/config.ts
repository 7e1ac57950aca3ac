import { relative } from 'node:path';
import type { CliOptions, ResolvedConfig } from './types/index.js';
import { DEFAULT_BINARY } from './apptainer/command.js';
import { DEFAULT_COMPOSE_NAME, findComposeFile } from './discovery.js';

export const COMPOSE_FILE_ENV = 'COMPOSE_FILE';
export const BINARY_ENV = 'COMPOSE2APPTAINER_BINARY';

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Settle the options of one invocation. Flags win over environment
 * variables, which win over what is found in `cwd`.
 */
export function resolveConfig(
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const discovered = findComposeFile(cwd);
  const composePath =
    nonEmpty(opts.file) ??
    nonEmpty(env[COMPOSE_FILE_ENV]) ??
    (discovered ? relative(cwd, discovered) : DEFAULT_COMPOSE_NAME);

  return {
    cwd,
    composePath,
    binary: nonEmpty(opts.binary) ?? nonEmpty(env[BINARY_ENV]) ?? DEFAULT_BINARY,
    dryRun: opts.dryRun ?? false,
    verbose: opts.verbose ?? false,
    writableTmpfs: opts.writableTmpfs ?? false,
  };
}

import type { CliOptions, ResolvedConfig } from '../types/index.js';
import { TranslationError } from '../errors.js';
import { resolveConfig } from '../config.js';
import { getVersion } from '../version.js';
import { runApptainer } from '../apptainer/exec.js';
import { showBanner, showContext, showOutro } from '../ui/banner.js';
import { createLogger, type Logger } from '../ui/logger.js';
import { printCommand, reportError } from '../ui/reporter.js';

export interface CommandContext {
  config: ResolvedConfig;
  logger: Logger;
}

export function createCommandContext(
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): CommandContext {
  const config = resolveConfig(opts, env, cwd);
  return { config, logger: createLogger({ verbose: config.verbose }) };
}

/**
 * Run one subcommand: translation failures are reported and turn into exit
 * status 1. Dry runs stay quiet apart from the commands themselves.
 */
export async function runTranslation(
  ctx: CommandContext,
  body: () => Promise<number>,
): Promise<number> {
  const interactive = !ctx.config.dryRun;
  if (interactive) {
    showBanner(getVersion());
    showContext(ctx.config);
  }

  let code: number;
  try {
    code = await body();
  } catch (err) {
    if (!(err instanceof TranslationError)) throw err;
    reportError(err, ctx.logger);
    code = 1;
  }

  if (interactive) {
    showOutro(code === 0 ? 'Done' : `Failed with exit status ${code}`, code !== 0);
  }
  return code;
}

/** Print and run the planned commands in order, stopping at the first failure. */
export async function executeAll(ctx: CommandContext, commands: string[][]): Promise<number> {
  for (const argv of commands) {
    printCommand(argv, { dryRun: ctx.config.dryRun, logger: ctx.logger });
    if (ctx.config.dryRun) continue;
    const code = await runApptainer(argv, { logger: ctx.logger, cwd: ctx.config.cwd });
    if (code !== 0) return code;
  }
  return 0;
}

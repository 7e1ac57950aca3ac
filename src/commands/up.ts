import type { CliOptions, ResolvedConfig, Service } from '../types/index.js';
import { synthesizeCommand } from '../apptainer/command.js';
import type { Logger } from '../ui/logger.js';
import type { Plan } from '../project.js';
import { artifactExists, loadProject, selectServices, translateService, writeDefinitions } from '../project.js';
import { createCommandContext, executeAll, runTranslation } from './shared.js';

/**
 * What bringing one service up takes: a build first when its artifact is
 * missing, then the run.
 */
export function planUp(service: Service, config: ResolvedConfig, logger: Logger): Plan {
  const plan: Plan = { definitions: [], commands: [] };
  if (service.build !== undefined && !artifactExists(service, config)) {
    plan.definitions.push(translateService(service, config, logger));
    plan.commands.push(synthesizeCommand(service, { action: 'build' }, config.binary));
  }
  plan.commands.push(synthesizeCommand(service, { action: 'up', writableTmpfs: config.writableTmpfs }, config.binary));
  return plan;
}

/** Run every selected service in declaration order. */
export async function upCommand(
  opts: CliOptions,
  names: string[] = [],
  cwd: string = process.cwd(),
): Promise<number> {
  const ctx = createCommandContext(opts, process.env, cwd);
  const { config, logger } = ctx;

  return runTranslation(ctx, async () => {
    const project = loadProject(config, logger);
    const plans = selectServices(project, names).map((service) => planUp(service, config, logger));
    writeDefinitions(plans.flatMap((plan) => plan.definitions), config, logger);
    return executeAll(ctx, plans.flatMap((plan) => plan.commands));
  });
}

import type { CliOptions } from '../types/index.js';
import { synthesizeCommand } from '../apptainer/command.js';
import { loadProject, selectServices, translateService, writeDefinitions } from '../project.js';
import { createCommandContext, executeAll, runTranslation } from './shared.js';

/** Translate and build the image artifacts of the selected services. */
export async function buildCommand(
  opts: CliOptions,
  names: string[] = [],
  cwd: string = process.cwd(),
): Promise<number> {
  const ctx = createCommandContext(opts, process.env, cwd);
  const { config, logger } = ctx;

  return runTranslation(ctx, async () => {
    const project = loadProject(config, logger);
    const services = selectServices(project, names).filter((service) => {
      if (service.build !== undefined) return true;
      if (names.includes(service.name)) logger.warn(`Service "${service.name}" has no 'build' directive, skipping`);
      return false;
    });

    if (services.length === 0) {
      logger.warn('No service to build');
      return 0;
    }

    const definitions = services.map((service) => translateService(service, config, logger));
    writeDefinitions(definitions, config, logger);
    return executeAll(
      ctx,
      services.map((service) => synthesizeCommand(service, { action: 'build' }, config.binary)),
    );
  });
}

import type { CliOptions } from '../types/index.js';
import { synthesizeCommand } from '../apptainer/command.js';
import { artifactExists, loadProject, selectServices, translateService, writeDefinitions } from '../project.js';
import { createCommandContext, executeAll, runTranslation } from './shared.js';

/** Run one service, replacing its configured command with `args` when any are given. */
export async function runCommand(
  opts: CliOptions,
  name: string,
  args: string[] = [],
  cwd: string = process.cwd(),
): Promise<number> {
  const ctx = createCommandContext(opts, process.env, cwd);
  const { config, logger } = ctx;

  return runTranslation(ctx, async () => {
    const project = loadProject(config, logger);
    const [service] = selectServices(project, [name]);

    const commands: string[][] = [];
    if (service.build !== undefined && !artifactExists(service, config)) {
      writeDefinitions([translateService(service, config, logger)], config, logger);
      commands.push(synthesizeCommand(service, { action: 'build' }, config.binary));
    }
    commands.push(
      synthesizeCommand(service, { action: 'run', writableTmpfs: config.writableTmpfs, args }, config.binary),
    );
    return executeAll(ctx, commands);
  });
}

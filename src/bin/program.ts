import { Command } from 'commander';
import type { ConvertOptions } from '../commands/convert.js';
import { getVersion } from '../version.js';

type GlobalOptions = {
  file?: string;
  binary?: string;
  dryRun?: boolean;
  verbose?: boolean;
  writableTmpfs?: boolean;
  output?: string;
};

function parseOptions(cmd: Command): ConvertOptions {
  const opts = cmd.optsWithGlobals<GlobalOptions>();
  return {
    file: opts.file,
    binary: opts.binary,
    dryRun: opts.dryRun ?? false,
    verbose: opts.verbose ?? false,
    writableTmpfs: opts.writableTmpfs ?? false,
    output: opts.output,
  };
}

/** The commander program; each action hands its exit status to `exit`. */
export function createProgram(exit: (code: number) => void = process.exit): Command {
  const program = new Command();

  program
    .name('compose2apptainer')
    .description('Run compose services and Dockerfiles with Apptainer')
    .version(getVersion())
    .option('-f, --file <path>', 'Compose file path (default: compose.yaml)')
    .option('--binary <path>', 'Container runtime binary (default: apptainer)')
    .option('--dry-run', 'Print the runtime commands instead of running them')
    .option('--verbose', 'Show debug output')
    .enablePositionalOptions()
    .showSuggestionAfterError(true);

  program
    .command('build')
    .description('Translate Dockerfiles and build service images')
    .argument('[services...]', 'Services to build (default: all with a build directive)')
    .action(async (services: string[], _opts: unknown, cmd: Command) => {
      const { buildCommand } = await import('../commands/build.js');
      exit(await buildCommand(parseOptions(cmd), services));
    });

  program
    .command('up')
    .description('Run services, building missing images first')
    .argument('[services...]', 'Services to run (default: all)')
    .option('--writable-tmpfs', 'Give containers a writable temporary overlay')
    .action(async (services: string[], _opts: unknown, cmd: Command) => {
      const { upCommand } = await import('../commands/up.js');
      exit(await upCommand(parseOptions(cmd), services));
    });

  program
    .command('run')
    .description('Run one service, optionally with a different command')
    .argument('<service>', 'Service to run')
    .argument('[args...]', 'Command and arguments replacing the service command')
    .option('--writable-tmpfs', 'Give the container a writable temporary overlay')
    .passThroughOptions()
    .action(async (service: string, args: string[], _opts: unknown, cmd: Command) => {
      const { runCommand } = await import('../commands/run.js');
      exit(await runCommand(parseOptions(cmd), service, args));
    });

  program
    .command('convert')
    .description('Translate a Dockerfile into an Apptainer definition file')
    .argument('[dockerfile]', 'Dockerfile path (default: ./Dockerfile)')
    .option('-o, --output <path>', 'Write the definition file here instead of stdout')
    .action(async (dockerfile: string | undefined, _opts: unknown, cmd: Command) => {
      const { convertCommand } = await import('../commands/convert.js');
      exit(await convertCommand(parseOptions(cmd), dockerfile));
    });

  return program;
}

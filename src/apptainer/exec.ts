import { execa, ExecaError } from 'execa';
import type { Logger } from '../ui/logger.js';
import { silentLogger } from '../ui/logger.js';

/**
 * Run the container runtime with the terminal attached and return its exit
 * status. A process that fails to start reports exit status 1.
 */
export async function runApptainer(argv: string[], opts?: { logger?: Logger; cwd?: string }): Promise<number> {
  const logger = opts?.logger ?? silentLogger;
  const [binary, ...args] = argv;
  if (binary === undefined) throw new Error('Empty command line');

  try {
    const result = await execa(binary, args, { stdio: 'inherit', cwd: opts?.cwd });
    return result.exitCode ?? 0;
  } catch (err: unknown) {
    if (err instanceof ExecaError) {
      logger.error(err.shortMessage);
      return err.exitCode ?? 1;
    }
    throw err;
  }
}

import type { CommandRequest, Service } from '../types/index.js';
import { MissingFieldError } from '../errors.js';

export const DEFAULT_BINARY = 'apptainer';

function buildArgs(service: Service, binary: string): string[] {
  if (!service.definitionFile || !service.artifactFile) {
    throw new MissingFieldError(`Service "${service.name}" has no build directive to build from`);
  }
  return [binary, 'build', '-F', service.artifactFile, service.definitionFile];
}

/** The image a run starts from: the build artifact when there is one, else the registry image. */
export function runImage(service: Service): string {
  if (service.build !== undefined && service.artifactFile) return service.artifactFile;
  if (service.image) return service.image;
  throw new MissingFieldError(`Service "${service.name}" needs an 'image' or a 'build' directive`);
}

/**
 * Produce the argument vector (binary first) that carries out `request` for
 * one resolved service.
 */
export function synthesizeCommand(service: Service, request: CommandRequest, binary = DEFAULT_BINARY): string[] {
  if (request.action === 'build') return buildArgs(service, binary);

  const command = service.command ?? [];
  const argv = [binary, command.length > 0 ? 'exec' : 'run'];

  if (request.writableTmpfs) argv.push('--writable-tmpfs');
  for (const bind of service.volumes.values()) {
    argv.push('--bind', bind);
  }
  for (const [name, value] of service.environment) {
    argv.push('--env', `${name}=${value}`);
  }
  argv.push(runImage(service));
  argv.push(...(request.action === 'run' && request.args.length > 0 ? request.args : command));
  return argv;
}

export function formatCommand(argv: string[]): string {
  return argv.join(' ');
}

import { existsSync } from 'node:fs';
import { join } from 'node:path';

/** Compose filenames looked up in the working directory, in order of preference. */
export const STANDARD_COMPOSE_NAMES = [
  'compose.yaml',
  'compose.yml',
  'docker-compose.yaml',
  'docker-compose.yml',
];

export const DEFAULT_COMPOSE_NAME = STANDARD_COMPOSE_NAMES[0];

const DOCKERFILE_NAMES = ['Dockerfile', 'dockerfile'];

function findFile(dir: string, names: string[]): string | undefined {
  for (const name of names) {
    const fullPath = join(dir, name);
    if (existsSync(fullPath)) return fullPath;
  }
  return undefined;
}

/** First standard compose file present in `dir`. */
export function findComposeFile(dir: string): string | undefined {
  return findFile(dir, STANDARD_COMPOSE_NAMES);
}

/** The Dockerfile of a build context directory. */
export function findDockerfile(dir: string): string | undefined {
  return findFile(dir, DOCKERFILE_NAMES);
}

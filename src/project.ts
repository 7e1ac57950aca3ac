import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ComposeProject, ResolvedConfig, Service } from './types/index.js';
import { MissingFieldError, MissingReferenceError } from './errors.js';
import { findDockerfile } from './discovery.js';
import { ComposeResolver } from './parsers/extends.js';
import { readDockerfile } from './parsers/dockerfile.js';
import { renderDefinition, saveDefinition } from './writers/definition.js';
import type { Logger } from './ui/logger.js';

export function loadProject(config: ResolvedConfig, logger: Logger): ComposeProject {
  const resolver = new ComposeResolver({ logger, cwd: config.cwd });
  const project = resolver.resolveFile(config.composePath);
  logger.debug(`Loaded ${project.services.length} service(s) from ${project.path}`);
  return project;
}

/** Services named on the command line, in the order given; all of them when none are named. */
export function selectServices(project: ComposeProject, names: string[]): Service[] {
  if (names.length === 0) return project.services;
  return names.map((name) => {
    const service = project.services.find((s) => s.name === name);
    if (!service) {
      throw new MissingReferenceError(`No service named "${name}" in ${project.path}`, { file: project.path });
    }
    return service;
  });
}

export function artifactExists(service: Service, config: ResolvedConfig): boolean {
  return service.artifactFile !== undefined && existsSync(resolve(config.cwd, service.artifactFile));
}

/** A rendered definition file waiting to be written. */
export interface PendingDefinition {
  /** Path relative to the working directory. */
  path: string;
  text: string;
}

/** Definition files to write and runtime commands to run, in order. */
export interface Plan {
  definitions: PendingDefinition[];
  commands: string[][];
}

/**
 * Translate the Dockerfile of a service's build context into the text of its
 * definition file. Nothing is written here.
 */
export function translateService(service: Service, config: ResolvedConfig, logger: Logger): PendingDefinition {
  if (service.build === undefined || service.definitionFile === undefined) {
    throw new MissingFieldError(`Service "${service.name}" has no 'build' directive`);
  }

  const dockerfile = findDockerfile(resolve(config.cwd, service.build));
  if (!dockerfile) {
    throw new MissingReferenceError(`No Dockerfile in build context "${service.build}" of service "${service.name}"`);
  }

  const recipe = readDockerfile(dockerfile, { logger, context: service.build, cwd: config.cwd });
  logger.debug(`${dockerfile}: ${recipe.stages.length} stage(s)`);
  return { path: service.definitionFile, text: renderDefinition(recipe) };
}

/** Write every translated definition. Dry runs write nothing. */
export function writeDefinitions(definitions: PendingDefinition[], config: ResolvedConfig, logger: Logger): void {
  if (config.dryRun) return;
  for (const definition of definitions) {
    saveDefinition(definition.text, resolve(config.cwd, definition.path));
    logger.step(`Wrote ${definition.path}`);
  }
}

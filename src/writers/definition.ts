import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { BuildStage, Recipe, StageCommand } from '../types/index.js';
import { MissingFieldError } from '../errors.js';

const BOOTSTRAP = 'docker';

/** `USER <name>` has no definition-file equivalent; switch users in the shell instead. */
export function rewriteUser(line: string): string {
  const match = line.match(/^USER\s+(\S+)/);
  if (!match) return line;
  return `su - ${match[1]} # ${line}`;
}

function commandText(command: StageCommand): string {
  return command.kind === 'exec' ? command.tokens.join(' ') : command.text;
}

/**
 * The startup line of the final stage: entrypoint, then command, run through
 * `exec` with the container arguments passed on.
 */
export function startupScript(stage: BuildStage): string[] {
  const parts = [stage.entrypoint, stage.cmd]
    .filter((command): command is StageCommand => command !== undefined)
    .map(commandText)
    .filter((text) => text !== '');

  let script = parts.join(' ');
  if (!/^exec(\s|$)/.test(script)) script = script === '' ? 'exec' : `exec ${script}`;
  if (!/"?\$@"?/.test(script)) script = `${script} "$@"`;

  const lines = stage.workdir ? [`cd ${stage.workdir}`, script] : [script];
  return lines.map(rewriteUser);
}

function section(name: string, lines: string[]): string[] {
  return lines.length === 0 ? [] : ['', `%${name}`, ...lines];
}

function renderStage(stage: BuildStage, final: boolean): string[] {
  const lines = [`Bootstrap: ${BOOTSTRAP}`, `From: ${stage.fromHeader}`, `Stage: ${stage.name}`];

  lines.push(...section('files', stage.files.map((f) => `${f.source} ${f.destination}`)));
  for (const [source, copies] of stage.stageFiles) {
    lines.push(...section(`files from ${source}`, copies.map((f) => `${f.source} ${f.destination}`)));
  }
  lines.push(...section('labels', stage.labels.map((l) => `${l.key} ${l.value}`)));
  lines.push(...section('post', stage.install.map(rewriteUser)));
  lines.push(...section('environment', stage.environment.map((e) => `export ${e}`)));

  if (final) {
    const script = startupScript(stage);
    lines.push(...section('runscript', script));
    lines.push(...section('startscript', script));
    if (stage.test) lines.push(...section('test', [stage.test]));
  }
  return lines;
}

/**
 * Serialize a recipe as an Apptainer definition file. Every stage must have a
 * base image; nothing is rendered otherwise.
 */
export function renderDefinition(recipe: Recipe): string {
  const missing = recipe.stages.find((stage) => stage.fromHeader === undefined);
  if (missing) {
    throw new MissingFieldError(`Build stage "${missing.name}" has no FROM instruction`, { file: recipe.source });
  }

  const blocks = recipe.stages.map((stage, i) => renderStage(stage, i === recipe.stages.length - 1).join('\n'));
  return `${blocks.join('\n\n')}\n`;
}

export function saveDefinition(text: string, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, text, 'utf-8');
}

/** Render first, then write, so a failing recipe never leaves a partial file behind. */
export function writeDefinitionFile(recipe: Recipe, path: string): string {
  const text = renderDefinition(recipe);
  saveDefinition(text, path);
  return text;
}

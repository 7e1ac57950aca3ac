import { existsSync } from 'node:fs';
import { posix, resolve } from 'node:path';
import type { BuildStage, Label, Recipe, SourceLine, StageCommand } from '../types/index.js';
import { GrammarError, MissingReferenceError } from '../errors.js';
import { joinPath } from '../paths.js';
import type { Logger } from '../ui/logger.js';
import { silentLogger } from '../ui/logger.js';
import { LineReader } from './lines.js';

export interface DockerfileParseOptions {
  logger?: Logger;
  /** Build context; relative copy sources are resolved against it. */
  context?: string;
  /** Directory relative paths are read from; defaults to the process directory. */
  cwd?: string;
}

interface DockerfileParserState {
  path: string;
  context: string;
  cwd: string;
  logger: Logger;
  stages: BuildStage[];
  active: BuildStage;
  /** Build-argument defaults, used for FROM substitution. */
  args: Map<string, string>;
  /** Handler of the previous instruction. */
  handler?: InstructionHandler;
}

/**
 * Receives the instruction text after the keyword, with continuation lines
 * joined. `lines` holds the physical lines as written, keyword stripped from
 * the first.
 */
type InstructionHandler = (
  state: DockerfileParserState,
  remainder: string,
  line: SourceLine,
  lines: string[],
) => void;

/** The physical lines of one instruction, numbered by the first. */
interface Instruction {
  line: SourceLine;
  parts: string[];
}

const ARCHIVE_RE = /\.(tar|tar\.gz|tgz|gz|gzip|bz2|xz)$/;
const URL_RE = /^https?:\/\//;

export function placeholderStageName(index: number): string {
  return `stage-${index}`;
}

export function createStage(index: number, name?: string): BuildStage {
  return {
    index,
    name: name ?? placeholderStageName(index),
    named: name !== undefined,
    install: [],
    environment: [],
    labels: [],
    files: [],
    stageFiles: new Map(),
    volumes: [],
    ports: [],
  };
}

// ── Tokenizing helpers ──────────────────────────────────────────────────────

/** Split on whitespace outside of single- or double-quoted spans; quotes are kept. */
export function splitWords(text: string): string[] {
  const words: string[] = [];
  let current = '';
  let quote: string | undefined;

  for (const char of text) {
    if (quote) {
      current += char;
      if (char === quote) quote = undefined;
    } else if (char === '"' || char === "'") {
      quote = char;
      current += char;
    } else if (/\s/.test(char)) {
      if (current) words.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  if (current) words.push(current);
  return words;
}

export function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}

function stripContinuation(text: string): string {
  return text.endsWith('\\') ? text.slice(0, -1).trimEnd() : text;
}

function parseJsonArray(text: string): string[] | undefined {
  if (!text.startsWith('[')) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (Array.isArray(parsed) && parsed.every((item): item is string => typeof item === 'string')) {
    return parsed;
  }
  return undefined;
}

/** CMD / ENTRYPOINT value: a JSON string array, else the raw text. */
export function parseStageCommand(text: string): StageCommand | undefined {
  if (text === '') return undefined;
  const tokens = parseJsonArray(text);
  return tokens ? { kind: 'exec', tokens } : { kind: 'shell', text };
}

/**
 * Parse the assignments of an ENV (or ARG) remainder into `KEY=VALUE`
 * strings. `KEY value ...` without `=` is the legacy single-variable form.
 */
export function parseEnvAssignments(text: string): string[] {
  const body = stripContinuation(text.trim());
  const words = splitWords(body);
  if (words.length === 0) return [];

  if (!words[0].includes('=')) {
    const key = words[0];
    const value = body.slice(key.length).trim();
    const quoted = /\s/.test(value) && unquote(value) === value ? `"${value}"` : value;
    return [`${key}=${quoted}`];
  }

  const exports: string[] = [];
  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (!word.includes('=')) {
      throw new GrammarError(`Expected KEY=VALUE, got '${word}'`);
    }
    // `KEY= "a b"`: the value got split off as its own word
    if (word.endsWith('=') && i + 1 < words.length && !words[i + 1].includes('=')) {
      exports.push(word + words[i + 1]);
      i++;
      continue;
    }
    exports.push(word);
  }
  return exports;
}

/** Replace `$NAME` and `${NAME}` with the recorded build-argument defaults. */
export function substituteArgs(text: string, args: Map<string, string>): string {
  let result = text;
  for (const [name, value] of args) {
    const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    result = result.replace(new RegExp(`\\$(?:\\{${escaped}\\}|${escaped}\\b)`, 'g'), () => value);
  }
  return result;
}

// ── Instruction handlers ────────────────────────────────────────────────────

function locate(state: DockerfileParserState, line: SourceLine): { file: string; line: number } {
  return { file: state.path, line: line.number };
}

function withLocation<T>(state: DockerfileParserState, line: SourceLine, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof GrammarError && !err.location) {
      throw new GrammarError(err.message, locate(state, line));
    }
    throw err;
  }
}

function comment(state: DockerfileParserState, line: SourceLine): void {
  state.active.install.push(`# ${line.text.trim()}`);
}

function addFile(state: DockerfileParserState, source: string, destination: string, fromStage?: string): void {
  if (source.includes('*')) {
    state.logger.warn(`Wildcards are not expanded in definition files: ${source}`);
  }

  if (fromStage !== undefined) {
    const copies = state.active.stageFiles.get(fromStage) ?? [];
    copies.push({ source, destination });
    state.active.stageFiles.set(fromStage, copies);
    return;
  }

  const resolved = joinPath(state.context, source);
  if (!source.includes('*') && !existsSync(resolve(state.cwd, resolved))) {
    state.logger.warn(`${resolved} doesn't exist, ensure it exists for the build`);
  }
  state.active.files.push({ source: resolved, destination });
}

/** Split a COPY/ADD remainder into flags and paths. */
function parseCopyArgs(
  state: DockerfileParserState,
  keyword: string,
  remainder: string,
  line: SourceLine,
): { flags: Map<string, string>; sources: string[]; destination: string } {
  const flags = new Map<string, string>();
  const words = splitWords(remainder);
  const paths: string[] = [];

  let i = 0;
  for (; i < words.length && words[i].startsWith('--'); i++) {
    const [flag, value = ''] = words[i].slice(2).split(/=(.*)/s);
    flags.set(flag, value);
  }
  const rest = words.slice(i).join(' ');
  paths.push(...(parseJsonArray(rest) ?? words.slice(i).map(unquote)));

  const destination = paths.pop();
  if (destination === undefined || paths.length === 0) {
    throw new GrammarError(`${keyword} requires at least one source and a destination`, locate(state, line));
  }
  return { flags, sources: paths, destination };
}

/** A stage declared before the active one, by name or by 0-based index. */
function findEarlierStage(state: DockerfileParserState, ref: string): BuildStage | undefined {
  const earlier = state.stages.filter((s) => s !== state.active);
  if (/^\d+$/.test(ref)) return earlier.find((s) => s.index === Number(ref) + 1);
  return earlier.find((s) => s.name === ref);
}

const handleFrom: InstructionHandler = (state, remainder, line) => {
  const header = substituteArgs(remainder, state.args);
  const match = header.match(/^(.+?)\s+[Aa][Ss]\s+(\S+)$/);
  const image = (match ? match[1] : header).trim();
  const name = match?.[2];

  if (image === '') {
    throw new GrammarError('FROM requires an image', locate(state, line));
  }
  const first = state.stages.length === 1 && state.active.fromHeader === undefined;
  const taken = state.stages.some((s) => s.name === name && !(first && s === state.active));
  if (name !== undefined && taken) {
    throw new GrammarError(`Duplicate stage name "${name}"`, locate(state, line));
  }

  if (first) {
    if (name !== undefined && !state.active.named) {
      state.active.name = name;
      state.active.named = true;
    }
  } else {
    const stage = createStage(state.stages.length + 1, name);
    state.stages.push(stage);
    state.active = stage;
  }

  state.active.fromHeader = image;
  if (image === 'scratch') {
    state.logger.warn('scratch is not available as a registry image; the build will fail to bootstrap');
  }
  state.logger.debug(`Stage #${state.active.index} (${state.active.name}) from ${image}`);
};

const handleRun: InstructionHandler = (state, _remainder, _line, lines) => {
  state.active.install.push(...lines.filter((text) => text !== ''));
};

const handleArg: InstructionHandler = (state, remainder, line) => {
  for (const word of splitWords(remainder)) {
    const separator = word.indexOf('=');
    if (separator === -1) {
      state.logger.warn(`ARG ${word} has no default value and is skipped (line ${line.number})`);
      continue;
    }
    const name = word.slice(0, separator);
    const value = unquote(word.slice(separator + 1));
    state.args.set(name, value);
    state.active.install.push(word);
    state.logger.debug(`ARG ${name}=${value}`);
  }
};

const handleEnv: InstructionHandler = (state, remainder, line) => {
  const exports = withLocation(state, line, () => parseEnvAssignments(remainder));
  state.active.install.push(...exports);
  state.active.environment.push(...exports);
};

const handleCopy: InstructionHandler = (state, remainder, line) => {
  const { flags, sources, destination } = parseCopyArgs(state, 'COPY', remainder, line);
  for (const flag of flags.keys()) {
    if (flag !== 'from') state.logger.warn(`COPY --${flag} is not supported and is dropped (line ${line.number})`);
  }
  const from = flags.get('from');
  const fromStage = from === undefined ? undefined : findEarlierStage(state, from)?.name;
  if (from !== undefined && fromStage === undefined) {
    throw new MissingReferenceError(`COPY --from=${from} refers to an undeclared stage`, locate(state, line));
  }
  for (const source of sources) {
    addFile(state, source, destination, fromStage);
  }
};

const handleAdd: InstructionHandler = (state, remainder, line) => {
  const { flags, sources, destination } = parseCopyArgs(state, 'ADD', remainder, line);
  for (const flag of flags.keys()) {
    state.logger.warn(`ADD --${flag} is not supported and is dropped (line ${line.number})`);
  }
  for (const source of sources) {
    const target = joinPath(destination, posix.basename(source));
    if (URL_RE.test(source)) {
      state.active.install.push(`curl -fsSL ${source} -o ${target}`);
    } else if (ARCHIVE_RE.test(source)) {
      addFile(state, source, destination);
      state.active.install.push(`tar -xf ${target} -C ${destination}`);
    } else {
      addFile(state, source, destination);
    }
  }
};

const handleCmd: InstructionHandler = (state, remainder) => {
  state.active.cmd = parseStageCommand(remainder);
};

const handleEntrypoint: InstructionHandler = (state, remainder) => {
  state.active.entrypoint = parseStageCommand(remainder);
};

const handleWorkdir: InstructionHandler = (state, remainder, line) => {
  if (remainder === '') throw new GrammarError('WORKDIR requires a path', locate(state, line));
  state.active.install.push(`mkdir -p ${remainder}`, `cd ${remainder}`);
  state.active.workdir = remainder;
};

const handleVolume: InstructionHandler = (state, remainder, line) => {
  state.active.volumes.push(...(parseJsonArray(remainder) ?? splitWords(remainder)));
  comment(state, line);
};

const handleExpose: InstructionHandler = (state, remainder, line) => {
  state.active.ports.push(...splitWords(remainder));
  comment(state, line);
};

const handleStopSignal: InstructionHandler = (state, remainder, line) => {
  state.active.stopSignal = remainder;
  comment(state, line);
};

const handleHealthcheck: InstructionHandler = (state, remainder) => {
  const body = remainder.replace(/^(--\S+\s+)*/, '').trim();
  if (/^NONE$/i.test(body)) {
    state.active.test = undefined;
    return;
  }
  const command = body.replace(/^CMD\s+/i, '');
  state.active.test = parseJsonArray(command)?.join(' ') ?? command;
};

const handleLabel: InstructionHandler = (state, remainder) => {
  const words = splitWords(remainder);
  if (words.length === 0) return;

  const labels: Label[] = [];
  if (!words[0].includes('=')) {
    labels.push({ key: unquote(words[0]), value: unquote(remainder.slice(words[0].length).trim()) });
  } else {
    for (const word of words) {
      const separator = word.indexOf('=');
      if (separator === -1) continue;
      labels.push({ key: unquote(word.slice(0, separator)), value: unquote(word.slice(separator + 1)) });
    }
  }
  state.active.labels.push(...labels);
};

const handleMaintainer: InstructionHandler = (state, remainder) => {
  state.active.labels.push({ key: 'maintainer', value: unquote(remainder) });
};

const handleDefault: InstructionHandler = (state, _remainder, _line, lines) => {
  state.active.install.push(...lines);
};

const HANDLERS: Record<string, InstructionHandler> = {
  FROM: handleFrom,
  ARG: handleArg,
  ENV: handleEnv,
  RUN: handleRun,
  ADD: handleAdd,
  COPY: handleCopy,
  CMD: handleCmd,
  ENTRYPOINT: handleEntrypoint,
  LABEL: handleLabel,
  MAINTAINER: handleMaintainer,
  VOLUME: handleVolume,
  EXPOSE: handleExpose,
  WORKDIR: handleWorkdir,
  HEALTHCHECK: handleHealthcheck,
  STOPSIGNAL: handleStopSignal,
};

// ── Parser ──────────────────────────────────────────────────────────────────

/**
 * Group physical lines into instructions. A line ending in `\` pulls in the
 * next one; comment lines inside such a run are dropped.
 */
function* instructions(reader: LineReader): Generator<Instruction> {
  for (let line = reader.next(); line; line = reader.next()) {
    const parts = [line.text.trim()];
    if (parts[0].startsWith('#')) {
      yield { line, parts };
      continue;
    }
    for (let last = parts[0]; last.endsWith('\\'); ) {
      const next = reader.next();
      if (!next) break;
      const text = next.text.trim();
      if (text.startsWith('#')) continue;
      parts.push(text);
      last = text;
    }
    yield { line, parts };
  }
}

function step(state: DockerfileParserState, instruction: Instruction): void {
  const { parts } = instruction;
  const text = parts.map(stripContinuation).join(' ');
  const line: SourceLine = { number: instruction.line.number, text };

  const [word] = text.split(/\s/, 1);
  const keyword = word.toUpperCase();
  const keywordHandler = Object.hasOwn(HANDLERS, keyword) ? HANDLERS[keyword] : undefined;

  let handler: InstructionHandler;
  let remainder: string;
  let lines: string[];
  if (keywordHandler) {
    handler = keywordHandler;
    remainder = text.slice(word.length).trim();
    lines = [parts[0].slice(word.length).trim(), ...parts.slice(1)];
  } else if (parts.length > 1 && state.handler) {
    // An unrecognised line that continues belongs to the previous instruction.
    handler = state.handler;
    remainder = text;
    lines = parts;
  } else {
    handler = handleDefault;
    remainder = text;
    lines = parts;
  }

  state.logger.debug(`[in] ${text}`);
  handler(state, remainder, line, lines);
  state.handler = handler;
}

/** Parse Dockerfile text into an ordered list of build stages. */
export function parseDockerfileLines(reader: LineReader, opts?: DockerfileParseOptions): Recipe {
  const first = createStage(1);
  const state: DockerfileParserState = {
    path: reader.path,
    context: opts?.context ?? '.',
    cwd: opts?.cwd ?? '',
    logger: opts?.logger ?? silentLogger,
    stages: [first],
    active: first,
    args: new Map(),
  };

  for (const instruction of instructions(reader)) {
    step(state, instruction);
  }

  return { source: reader.path, stages: state.stages };
}

const READER_OPTIONS = { keepComments: true, keepExtensions: true };

export function parseDockerfile(raw: string, path: string, opts?: DockerfileParseOptions): Recipe {
  return parseDockerfileLines(new LineReader(raw, path, READER_OPTIONS), opts);
}

export function readDockerfile(path: string, opts?: DockerfileParseOptions): Recipe {
  const reader = LineReader.fromFile(resolve(opts?.cwd ?? '', path), READER_OPTIONS);
  return { ...parseDockerfileLines(reader, opts), source: path };
}

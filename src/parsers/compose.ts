import { resolve } from 'node:path';
import type { ComposeDocument, ServiceDeclaration, Service } from '../types/index.js';
import { GrammarError, MissingReferenceError } from '../errors.js';
import { joinPath } from '../paths.js';
import type { Logger } from '../ui/logger.js';
import { silentLogger } from '../ui/logger.js';
import { LineReader } from './lines.js';

export const IMAGE_SCHEME = 'docker://';

export type ComposeEvent =
  | { kind: 'entry'; line: number; indent: number; key: string; value?: string }
  | { kind: 'item'; line: number; indent: number; value: string }
  | { kind: 'invalid'; line: number; indent: number; reason: string };

export interface ComposeParseOptions {
  logger?: Logger;
  /** Directory relative file paths are read from; defaults to the process directory. */
  cwd?: string;
}

// ── Tokenizer ───────────────────────────────────────────────────────────────

function hasForbiddenText(s: string, extra: string[] = []): boolean {
  return [' ', ': ', ...extra].some((bad) => s.includes(bad));
}

/**
 * Split the content of one line into a key and an optional value. A line
 * either ends with `:` (block-opening key) or splits on `": "` into exactly
 * two parts.
 */
export function splitEntry(text: string): { key: string; value?: string } | { reason: string } {
  if (text.endsWith(':')) {
    const key = text.slice(0, -1);
    if (key === '' || hasForbiddenText(key, [':'])) {
      return { reason: `Invalid key '${key}'` };
    }
    return { key };
  }

  const parts = text.split(': ');
  if (parts.length !== 2) {
    return { reason: `Expected 'key: value' or 'key:', got '${text}'` };
  }
  const [key, rawValue] = parts;
  if (key === '' || hasForbiddenText(key)) {
    return { reason: `Invalid key '${key}'` };
  }
  const value = rawValue.trimStart();
  return value === '' ? { key } : { key, value };
}

export function tokenizeLine(text: string, line: number): ComposeEvent {
  const content = text.replace(/^ +/, '');
  const indent = text.length - content.length;
  const trimmed = content.trimEnd();

  if (trimmed === '-' || trimmed.startsWith('- ')) {
    return { kind: 'item', line, indent, value: trimmed.slice(1).trim() };
  }

  const entry = splitEntry(trimmed);
  if ('reason' in entry) {
    return { kind: 'invalid', line, indent, reason: entry.reason };
  }
  return { kind: 'entry', line, indent, ...entry };
}

/** Turn filtered compose lines into `(indent, key, value?)` events. */
export function* tokenizeCompose(reader: LineReader): Generator<ComposeEvent> {
  for (let line = reader.next(); line; line = reader.next()) {
    yield tokenizeLine(line.text, line.number);
  }
}

// ── Value helpers ───────────────────────────────────────────────────────────

function isWrapped(value: string, quote: string): boolean {
  return value.length >= 2 && value.startsWith(quote) && value.endsWith(quote);
}

/**
 * Environment values are stored ready for `--env KEY=VALUE`: `null` and empty
 * values become the empty string, double quotes become single quotes, and
 * bare values are wrapped in single quotes.
 */
export function normalizeEnvironmentValue(value: string | undefined): string {
  if (value === undefined || value === '' || value === 'null') return '';
  if (isWrapped(value, "'")) return value;
  if (isWrapped(value, '"')) return `'${value.slice(1, -1)}'`;
  return `'${value}'`;
}

/** Parse `host:container[:mode]`; the mode is dropped. */
export function parseVolumeEntry(entry: string): { container: string; bind: string } | undefined {
  const value = isWrapped(entry, '"') || isWrapped(entry, "'") ? entry.slice(1, -1) : entry;
  const colons = value.split(':').length - 1;
  if (colons !== 1 && colons !== 2) return undefined;
  const [host, container] = value.split(':');
  if (host === '' || container === '') return undefined;
  return { container, bind: `${host}:${container}` };
}

export function createService(name: string): Service {
  return { name, volumes: new Map(), environment: new Map() };
}

// ── Parser ──────────────────────────────────────────────────────────────────

type Frame =
  | { kind: 'document' }
  | { kind: 'services' }
  | { kind: 'service'; declaration: ServiceDeclaration }
  | { kind: 'volumes'; declaration: ServiceDeclaration }
  | { kind: 'environment'; declaration: ServiceDeclaration }
  | { kind: 'extends'; declaration: ServiceDeclaration; line: number; file?: string; service?: string };

interface ComposeParserState {
  path: string;
  logger: Logger;
  stack: Frame[];
  declarations: ServiceDeclaration[];
}

/** Frames that own sub-blocks we skip (unknown top-level sections, `networks`). */
const LENIENT_FRAMES = new Set<Frame['kind']>(['document', 'service']);

function childIndent(state: ComposeParserState): number {
  return (state.stack.length - 1) * 2;
}

function top(state: ComposeParserState): Frame {
  return state.stack[state.stack.length - 1];
}

function fail(state: ComposeParserState, line: number, message: string): never {
  throw new GrammarError(message, { file: state.path, line });
}

function requireEntry(
  state: ComposeParserState,
  event: ComposeEvent,
): Extract<ComposeEvent, { kind: 'entry' }> {
  if (event.kind === 'invalid') fail(state, event.line, event.reason);
  if (event.kind === 'item') fail(state, event.line, `Unexpected list item '- ${event.value}'`);
  return event;
}

function requireScalar(state: ComposeParserState, event: Extract<ComposeEvent, { kind: 'entry' }>): string {
  if (event.value === undefined) {
    fail(state, event.line, `'${event.key}' requires a value`);
  }
  if (hasForbiddenText(event.value)) {
    fail(state, event.line, `Invalid value '${event.value}' for '${event.key}'`);
  }
  return event.value;
}

function requireBlock(state: ComposeParserState, event: Extract<ComposeEvent, { kind: 'entry' }>): void {
  if (event.value !== undefined) {
    fail(state, event.line, `'${event.key}' must be a nested block, inline values are not supported`);
  }
}

function closeFrame(state: ComposeParserState, frame: Frame): void {
  if (frame.kind === 'service') {
    state.declarations.push(frame.declaration);
    return;
  }
  if (frame.kind === 'extends') {
    if (frame.file === undefined || frame.service === undefined) {
      throw new MissingReferenceError(
        `'extends' of service "${frame.declaration.service.name}" needs both 'file' and 'service'`,
        { file: state.path, line: frame.line },
      );
    }
    frame.declaration.extends = { file: frame.file, service: frame.service, line: frame.line };
  }
}

function onDocument(state: ComposeParserState, event: ComposeEvent): void {
  if (event.kind === 'entry' && event.key === 'services' && event.value === undefined) {
    state.stack.push({ kind: 'services' });
  }
}

function onServices(state: ComposeParserState, event: ComposeEvent): void {
  const entry = requireEntry(state, event);
  if (entry.value !== undefined) {
    fail(state, entry.line, `Service header '${entry.key}' must not carry a value`);
  }
  if (state.declarations.some((d) => d.service.name === entry.key)) {
    fail(state, entry.line, `Duplicate service "${entry.key}"`);
  }
  state.stack.push({
    kind: 'service',
    declaration: { service: createService(entry.key), line: entry.line },
  });
}

function onService(state: ComposeParserState, declaration: ServiceDeclaration, event: ComposeEvent): void {
  const entry = requireEntry(state, event);
  const service = declaration.service;

  switch (entry.key) {
    case 'image':
      service.image = IMAGE_SCHEME + requireScalar(state, entry);
      break;

    case 'build': {
      const context = requireScalar(state, entry);
      service.build = context;
      service.definitionFile = joinPath(context, `${service.name}.def`);
      service.artifactFile = joinPath(context, `${service.name}.sif`);
      break;
    }

    case 'command':
      if (entry.value === undefined) fail(state, entry.line, `'command' requires a value`);
      service.command = entry.value.split(' ').filter((token) => token !== '');
      break;

    case 'volumes':
      requireBlock(state, entry);
      state.stack.push({ kind: 'volumes', declaration });
      break;

    case 'environment':
      requireBlock(state, entry);
      state.stack.push({ kind: 'environment', declaration });
      break;

    case 'extends':
      if (declaration.extends) fail(state, entry.line, `Service "${service.name}" extends more than once`);
      if (entry.value !== undefined) {
        declaration.extends = { service: requireScalar(state, entry), line: entry.line };
      } else {
        state.stack.push({ kind: 'extends', declaration, line: entry.line });
      }
      break;

    case 'networks':
      state.logger.warn(`'networks' is not supported. Ignoring it for service "${service.name}".`);
      break;

    default:
      fail(state, entry.line, `Unsupported key '${entry.key}' in service "${service.name}"`);
  }
}

function onVolume(state: ComposeParserState, declaration: ServiceDeclaration, event: ComposeEvent): void {
  if (event.kind !== 'item') {
    fail(state, event.line, `Expected a '- host:container' volume entry`);
  }
  const volume = parseVolumeEntry(event.value);
  if (!volume) {
    fail(state, event.line, `Invalid volume '${event.value}', expected host:container[:mode]`);
  }
  declaration.service.volumes.set(volume.container, volume.bind);
}

function onEnvironment(state: ComposeParserState, declaration: ServiceDeclaration, event: ComposeEvent): void {
  if (event.kind === 'item') {
    const separator = event.value.indexOf('=');
    const key = separator === -1 ? event.value : event.value.slice(0, separator);
    const value = separator === -1 ? undefined : event.value.slice(separator + 1);
    if (key === '' || hasForbiddenText(key)) {
      fail(state, event.line, `Invalid environment variable name '${key}'`);
    }
    declaration.service.environment.set(key, normalizeEnvironmentValue(value));
    return;
  }
  const entry = requireEntry(state, event);
  declaration.service.environment.set(entry.key, normalizeEnvironmentValue(entry.value));
}

function onExtends(state: ComposeParserState, frame: Extract<Frame, { kind: 'extends' }>, event: ComposeEvent): void {
  const entry = requireEntry(state, event);
  switch (entry.key) {
    case 'file':
      frame.file = requireScalar(state, entry);
      break;
    case 'service':
      frame.service = requireScalar(state, entry);
      break;
    default:
      fail(state, entry.line, `Unsupported key '${entry.key}' in 'extends'`);
  }
}

function dispatch(state: ComposeParserState, event: ComposeEvent): void {
  const frame = top(state);
  switch (frame.kind) {
    case 'document':
      return onDocument(state, event);
    case 'services':
      return onServices(state, event);
    case 'service':
      return onService(state, frame.declaration, event);
    case 'volumes':
      return onVolume(state, frame.declaration, event);
    case 'environment':
      return onEnvironment(state, frame.declaration, event);
    case 'extends':
      return onExtends(state, frame, event);
  }
}

/**
 * Parse the service declarations of one compose document. `extends`
 * references are recorded, not resolved; see ComposeResolver.
 */
export function parseComposeEvents(
  events: Iterable<ComposeEvent>,
  path: string,
  opts?: ComposeParseOptions,
): ComposeDocument {
  const state: ComposeParserState = {
    path,
    logger: opts?.logger ?? silentLogger,
    stack: [{ kind: 'document' }],
    declarations: [],
  };

  for (const event of events) {
    while (state.stack.length > 1 && event.indent < childIndent(state)) {
      const frame = state.stack.pop();
      if (frame) closeFrame(state, frame);
    }

    if (event.indent > childIndent(state)) {
      if (LENIENT_FRAMES.has(top(state).kind)) continue;
      fail(state, event.line, `Unexpected indentation (${event.indent} columns)`);
    }

    dispatch(state, event);
  }

  while (state.stack.length > 1) {
    const frame = state.stack.pop();
    if (frame) closeFrame(state, frame);
  }

  return { path, declarations: state.declarations };
}

export function parseComposeDocument(raw: string, path: string, opts?: ComposeParseOptions): ComposeDocument {
  return parseComposeEvents(tokenizeCompose(new LineReader(raw, path)), path, opts);
}

export function readComposeDocument(path: string, opts?: ComposeParseOptions): ComposeDocument {
  const reader = LineReader.fromFile(resolve(opts?.cwd ?? '', path));
  return parseComposeEvents(tokenizeCompose(reader), path, opts);
}

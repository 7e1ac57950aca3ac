import { readFileSync } from 'node:fs';
import type { SourceLine } from '../types/index.js';
import { MissingReferenceError } from '../errors.js';

export interface LineFilterOptions {
  /** Keep full-line `#` comments instead of dropping them. */
  keepComments?: boolean;
  /** Keep lines whose content starts with `x-` (compose vendor extensions). */
  keepExtensions?: boolean;
}

/**
 * Whether a raw line survives the filter. Blank lines always go; comment and
 * `x-` lines go unless the options keep them. Lines nested under a dropped
 * `x-` key are dropped by the reader as well.
 */
export function keepLine(text: string, opts?: LineFilterOptions): boolean {
  const content = text.replace(/^ +/, '');
  if (content.trim() === '') return false;
  if (content.startsWith('#')) return opts?.keepComments ?? false;
  if (content.startsWith('x-')) return opts?.keepExtensions ?? false;
  return true;
}

function indentOf(text: string): number {
  return text.length - text.replace(/^ +/, '').length;
}

function* filterLines(raw: string, opts?: LineFilterOptions): Generator<SourceLine> {
  const lines = raw.split(/\r?\n/);
  // Indent of the `x-` key whose nested block is being dropped.
  let extensionIndent: number | undefined;

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    if (text.trim() === '') continue;
    if (!opts?.keepComments && text.trimStart().startsWith('#')) continue;

    if (extensionIndent !== undefined) {
      if (indentOf(text) > extensionIndent) continue;
      extensionIndent = undefined;
    }

    if (!keepLine(text, opts)) {
      if (!opts?.keepExtensions && text.trimStart().startsWith('x-')) {
        extensionIndent = indentOf(text);
      }
      continue;
    }

    yield { number: i + 1, text };
  }
}

/**
 * Forward-only reader over the filtered lines of a document. `next()` returns
 * `undefined` once the input is exhausted and keeps doing so, which lets
 * one-line-lookahead consumers test for the end uniformly.
 */
export class LineReader {
  private readonly lines: Iterator<SourceLine>;
  private done = false;

  constructor(
    raw: string,
    public readonly path: string,
    opts?: LineFilterOptions,
  ) {
    this.lines = filterLines(raw, opts);
  }

  static fromFile(path: string, opts?: LineFilterOptions): LineReader {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new MissingReferenceError(`Cannot read ${path}: ${reason}`, { file: path });
    }
    return new LineReader(raw, path, opts);
  }

  next(): SourceLine | undefined {
    if (this.done) return undefined;
    const result = this.lines.next();
    if (result.done) {
      this.done = true;
      return undefined;
    }
    return result.value;
  }
}

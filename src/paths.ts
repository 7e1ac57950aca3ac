import { posix } from 'node:path';

/** Collapse `//` and `/./` runs; everything else is left as written. */
export function removeRedundantSlashes(path: string): string {
  let current = path;
  let previous: string;
  do {
    previous = current;
    current = current.replace(/\/\//g, '/').replace(/\/\.\//g, '/');
  } while (current !== previous);
  return current;
}

export function parentDirectory(file: string): string {
  return posix.dirname(file);
}

/**
 * Prefix a relative path with a directory. Absolute paths and the current
 * directory (`.`) pass through unchanged.
 */
export function joinPath(dir: string, path: string): string {
  if (path.startsWith('/')) return path;
  if (dir === '' || dir === '.') return path;
  if (path === '.' || path === './') return dir;
  return removeRedundantSlashes(`${dir}/${path}`);
}

/** Rewrite the host side of a `host:container` bind relative to a directory. */
export function rebaseBind(dir: string, bind: string): string {
  const separator = bind.indexOf(':');
  if (separator === -1) return joinPath(dir, bind);
  return joinPath(dir, bind.slice(0, separator)) + bind.slice(separator);
}

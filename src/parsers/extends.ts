import { resolve } from 'node:path';
import type { ComposeDocument, ComposeProject, Service, ServiceDeclaration } from '../types/index.js';
import { ExtendsCycleError, MissingReferenceError } from '../errors.js';
import { joinPath, parentDirectory, rebaseBind } from '../paths.js';
import type { Logger } from '../ui/logger.js';
import { silentLogger } from '../ui/logger.js';
import { readComposeDocument } from './compose.js';

export const MAX_EXTENDS_DEPTH = 32;

export interface ResolverOptions {
  logger?: Logger;
  maxDepth?: number;
  /** Directory relative compose paths are read from. */
  cwd?: string;
  /** Loads a compose document by path; defaults to reading it from disk. */
  load?: (path: string) => ComposeDocument;
}

function cloneService(service: Service): Service {
  return {
    ...service,
    command: service.command ? [...service.command] : undefined,
    volumes: new Map(service.volumes),
    environment: new Map(service.environment),
  };
}

/**
 * Merge a child service over the parent it extends, then rewrite every path
 * of the result relative to `parentDir`. Each field has its own rule:
 *
 * - `name`: always the child's.
 * - `image`, `command`: the child's when set, else the parent's.
 * - `build`, `definitionFile`, `artifactFile`: taken together; the child's
 *   when the child has a build directive, else the parent's.
 * - `volumes`: the child's map when it has entries, else the parent's.
 * - `environment`: the child's map when it has entries, else the parent's.
 */
export function mergeExtends(parent: Service, child: Service, parentDir: string): Service {
  const source = child.build !== undefined ? child : parent;
  const rebase = (path: string | undefined) => path && joinPath(parentDir, path);

  const merged: Service = {
    name: child.name,
    image: child.image ?? parent.image,
    command: child.command?.length ? [...child.command] : parent.command && [...parent.command],
    volumes: new Map(),
    environment: new Map(child.environment.size > 0 ? child.environment : parent.environment),
  };

  if (source.build !== undefined) {
    merged.build = rebase(source.build);
    merged.definitionFile = rebase(source.definitionFile);
    merged.artifactFile = rebase(source.artifactFile);
  }

  for (const [container, bind] of child.volumes.size > 0 ? child.volumes : parent.volumes) {
    merged.volumes.set(container, rebaseBind(parentDir, bind));
  }

  return merged;
}

/**
 * Resolves `extends` chains across compose files. Parsed documents and
 * resolved services are cached per resolver, keyed by absolute file path.
 */
export class ComposeResolver {
  private readonly logger: Logger;
  private readonly maxDepth: number;
  private readonly cwd: string;
  private readonly load: (path: string) => ComposeDocument;
  private readonly documents = new Map<string, ComposeDocument>();
  private readonly resolved = new Map<string, Service>();

  constructor(opts?: ResolverOptions) {
    this.logger = opts?.logger ?? silentLogger;
    this.maxDepth = opts?.maxDepth ?? MAX_EXTENDS_DEPTH;
    this.cwd = opts?.cwd ?? '';
    this.load = opts?.load ?? ((path) => readComposeDocument(path, { logger: this.logger, cwd: this.cwd }));
  }

  resolveFile(path: string): ComposeProject {
    return this.resolveDocument(this.document(path));
  }

  resolveDocument(doc: ComposeDocument): ComposeProject {
    this.documents.set(resolve(this.cwd, doc.path), doc);
    return {
      path: doc.path,
      services: doc.declarations.map((decl) => this.resolveDeclaration(doc, decl, [])),
    };
  }

  private document(path: string, from?: { file: string; line: number }): ComposeDocument {
    const key = resolve(this.cwd, path);
    const cached = this.documents.get(key);
    if (cached) return cached;
    let doc: ComposeDocument;
    try {
      doc = this.load(path);
    } catch (err) {
      if (err instanceof MissingReferenceError && from) {
        throw new MissingReferenceError(`Extended compose file not found: ${path}`, from);
      }
      throw err;
    }
    this.documents.set(key, doc);
    return doc;
  }

  private resolveDeclaration(doc: ComposeDocument, decl: ServiceDeclaration, chain: string[]): Service {
    const id = `${resolve(this.cwd, doc.path)}#${decl.service.name}`;
    const cached = this.resolved.get(id);
    if (cached) return cloneService(cached);

    const label = `${doc.path}#${decl.service.name}`;
    if (chain.includes(id) || chain.length >= this.maxDepth) {
      throw new ExtendsCycleError(
        `'extends' of service "${decl.service.name}" loops back on itself`,
        [...chain, id],
        { file: doc.path, line: decl.line },
      );
    }

    let service: Service;
    const ref = decl.extends;
    if (!ref) {
      service = cloneService(decl.service);
    } else {
      const location = { file: doc.path, line: ref.line };
      const parentPath = ref.file === undefined ? doc.path : joinPath(parentDirectory(doc.path), ref.file);
      const parentDoc = this.document(parentPath, location);
      const parentDecl = parentDoc.declarations.find((d) => d.service.name === ref.service);
      if (!parentDecl) {
        throw new MissingReferenceError(`Service "${ref.service}" not found in ${parentPath}`, location);
      }
      this.logger.debug(`${label} extends ${parentPath}#${ref.service}`);
      const parent = this.resolveDeclaration(parentDoc, parentDecl, [...chain, id]);
      // The parent's paths are relative to its own file; rebase them onto this one.
      const relativeDir = ref.file === undefined ? '.' : parentDirectory(ref.file);
      service = mergeExtends(parent, decl.service, relativeDir);
    }

    this.resolved.set(id, service);
    return cloneService(service);
  }
}

/** Parse a compose file and resolve every service it declares. */
export function parseCompose(path: string, opts?: ResolverOptions): ComposeProject {
  return new ComposeResolver(opts).resolveFile(path);
}

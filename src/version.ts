import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const PACKAGE_NAME = 'compose2apptainer';

let cached: string | undefined;

function readPackageVersion(path: string): string | undefined {
  if (!existsSync(path)) return undefined;
  const pkg: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (typeof pkg !== 'object' || pkg === null) return undefined;
  if (!('name' in pkg) || pkg.name !== PACKAGE_NAME) return undefined;
  return 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : undefined;
}

export function getVersion(): string {
  if (cached) return cached;
  const here = dirname(fileURLToPath(import.meta.url));
  // Bundled (dist/bin/, dist/) and source (src/) layouts
  const candidates = [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')];
  for (const candidate of candidates) {
    const version = readPackageVersion(candidate);
    if (version) {
      cached = version;
      return cached;
    }
  }
  cached = '0.0.0';
  return cached;
}

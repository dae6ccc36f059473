import * as fs from 'fs';
import * as path from 'path';

/**
 * The parts of a package.json the pipeline reads.
 */
export interface PackageManifest {
  name: string;
  version: string;
  dependencies: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readPackageManifest(packageDir: string): PackageManifest {
  const manifestPath = path.join(packageDir, 'package.json');
  if (!fs.existsSync(manifestPath)) {
    throw new Error(`Package manifest not found: ${manifestPath}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error(`Package manifest must be a JSON object: ${manifestPath}`);
  }
  if (typeof parsed.name !== 'string' || !parsed.name) {
    throw new Error(`Package manifest missing required field: name (${manifestPath})`);
  }
  if (typeof parsed.version !== 'string' || !parsed.version) {
    throw new Error(`Package manifest missing required field: version (${manifestPath})`);
  }

  const dependencies: Record<string, string> = {};
  if (parsed.dependencies !== undefined) {
    if (!isRecord(parsed.dependencies)) {
      throw new Error(`Package manifest dependencies must be an object (${manifestPath})`);
    }
    for (const [name, range] of Object.entries(parsed.dependencies)) {
      if (typeof range !== 'string') {
        throw new Error(`Dependency ${name} must have a version range (${manifestPath})`);
      }
      dependencies[name] = range;
    }
  }

  return { name: parsed.name, version: parsed.version, dependencies };
}

/**
 * `name@range` install specs in declaration order.
 */
export function dependencySpecs(manifest: PackageManifest): string[] {
  return Object.entries(manifest.dependencies).map(([name, range]) => `${name}@${range}`);
}

/**
 * File name npm gives a packed tarball: scoped names drop the `@` and
 * replace the slash with a dash.
 */
export function tarballName(manifest: PackageManifest): string {
  const base = manifest.name.replace(/^@/, '').replace('/', '-');
  return `${base}-${manifest.version}.tgz`;
}

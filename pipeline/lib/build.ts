import * as fs from 'fs';
import * as path from 'path';
import { build } from 'esbuild';
import { writeArchive } from './archive';
import { PipelineError, describeCause } from './errors';
import type { PipelineLogger } from './logger';
import { readPackageManifest, tarballName } from './manifest';
import type { PackageManifest } from './manifest';
import type { PipelineSettings } from './settings';

export interface BuildResult {
  manifest: PackageManifest;
  /** Packed helpers distribution, installed into the layer. */
  distributionPath: string;
  /** Compiled entry point, copied to the archive root. */
  entryPointPath: string;
}

const NODE_TARGET = 'node20';

/**
 * Builds the function's own code from scratch: the helpers package as an
 * npm tarball and the entry point as a single CommonJS file.
 */
export async function buildDistribution(settings: PipelineSettings, logger: PipelineLogger): Promise<BuildResult> {
  const { distDir } = settings;

  logger.step(`Removing previous build output ${distDir}`);
  fs.rmSync(distDir, { recursive: true, force: true });

  let manifest: PackageManifest;
  try {
    manifest = readPackageManifest(settings.helpersDir);
  } catch (error) {
    throw new PipelineError('build', `Cannot read helpers package: ${describeCause(error)}`, { cause: error });
  }

  const packageDir = path.join(distDir, 'package');
  const distributionPath = path.join(distDir, tarballName(manifest));
  const entryPointPath = path.join(distDir, settings.entryPointName);

  try {
    fs.mkdirSync(packageDir, { recursive: true });

    logger.step(`Bundling ${manifest.name}@${manifest.version}`);
    await build({
      entryPoints: [path.join(settings.helpersDir, 'src', 'index.ts')],
      outfile: path.join(packageDir, 'index.js'),
      bundle: true,
      packages: 'external',
      platform: 'node',
      target: NODE_TARGET,
      format: 'cjs',
      logLevel: 'warning'
    });

    // Installed copies resolve the bundle, not the TypeScript sources the
    // workspace manifest points at.
    const distManifest = {
      name: manifest.name,
      version: manifest.version,
      main: 'index.js',
      dependencies: manifest.dependencies
    };
    fs.writeFileSync(path.join(packageDir, 'package.json'), `${JSON.stringify(distManifest, null, 2)}\n`);

    await writeArchive('tgz', packageDir, distributionPath, 'package');
    fs.rmSync(packageDir, { recursive: true, force: true });

    logger.step(`Compiling entry point ${path.relative(settings.projectRoot, settings.entryPointSource)}`);
    await build({
      entryPoints: [settings.entryPointSource],
      outfile: entryPointPath,
      bundle: false,
      platform: 'node',
      target: NODE_TARGET,
      format: 'cjs',
      logLevel: 'warning'
    });
  } catch (error) {
    throw new PipelineError('build', `Build failed: ${describeCause(error)}`, { cause: error });
  }

  logger.success(`Built ${path.basename(distributionPath)} and ${settings.entryPointName}`);
  return { manifest, distributionPath, entryPointPath };
}

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { BuildResult } from './build';
import type { CommandRunner } from './command-runner';
import { PipelineError, describeCause } from './errors';
import type { PipelineLogger } from './logger';
import { dependencySpecs } from './manifest';
import type { PipelineSettings } from './settings';

export interface LayerResult {
  stagingDir: string;
  installed: string[];
  /** Package directories removed from node_modules, relative to it. */
  pruned: string[];
}

const NPM_INSTALL_FLAGS = ['--omit=dev', '--no-save', '--no-package-lock', '--no-audit', '--no-fund'];

function npmInstall(runner: CommandRunner, stagingDir: string, specs: string[]): void {
  runner.run('npm', ['install', '--prefix', stagingDir, ...NPM_INSTALL_FLAGS, ...specs], stagingDir);
}

/**
 * Deletes every package matching one of the patterns, at the top of
 * node_modules or nested under another package's node_modules, and returns
 * the removed paths relative to nodeModulesDir, sorted.
 */
export async function pruneExcludedPackages(nodeModulesDir: string, patterns: string[]): Promise<string[]> {
  if (!fs.existsSync(nodeModulesDir)) {
    return [];
  }

  const nested = patterns.map(pattern => `**/node_modules/${pattern}`);
  const matches = await glob([...patterns, ...nested], { cwd: nodeModulesDir, dot: true, posix: true });
  const removed = [...new Set(matches)].sort();
  for (const match of removed) {
    fs.rmSync(path.join(nodeModulesDir, match), { recursive: true, force: true });
  }
  return removed;
}

/**
 * Installs the runtime dependencies and the helpers distribution into a
 * fresh staging directory, then strips the excluded image-library packages.
 */
export async function buildLayer(
  settings: PipelineSettings,
  buildResult: BuildResult,
  runner: CommandRunner,
  logger: PipelineLogger
): Promise<LayerResult> {
  const { stagingDir } = settings;

  // An archive from an earlier run no longer matches the layer being built
  fs.rmSync(settings.archivePath, { force: true });

  logger.step(`Resetting layer directory ${stagingDir}`);
  fs.rmSync(stagingDir, { recursive: true, force: true });
  fs.mkdirSync(stagingDir, { recursive: true });

  // One install: with no manifest in the staging directory, npm removes
  // whatever an earlier --no-save install added
  const specs = dependencySpecs(buildResult.manifest);
  try {
    logger.step(`Installing ${specs.length} runtime dependencies and ${path.basename(buildResult.distributionPath)}`);
    npmInstall(runner, stagingDir, [...specs, buildResult.distributionPath]);
  } catch (error) {
    throw new PipelineError('build_layer', `Dependency install failed: ${describeCause(error)}`, { cause: error });
  }

  const pruned = await pruneExcludedPackages(path.join(stagingDir, 'node_modules'), settings.excludedPackages);
  if (pruned.length > 0) {
    logger.info(`Removed excluded packages: ${pruned.join(', ')}`);
  }

  logger.success(`Layer ready in ${stagingDir}`);
  return { stagingDir, installed: [...specs, buildResult.distributionPath], pruned };
}

import * as path from 'path';
import { ARCHIVE_NAME, DEFAULT_ARTIFACTS_DIR } from '../../lib/deployment-target';

/**
 * Installed package directories stripped from the layer. The Lambda runtime
 * gets the image library from its own layer, built for its architecture.
 */
export const EXCLUDED_PACKAGES = ['sharp', '@img/sharp-*'];

export interface PipelineSettings {
  projectRoot: string;
  artifactsDir: string;
  /** Build output; removed at the start of every build. */
  distDir: string;
  /** Layer staging directory, zipped into the archive. */
  stagingDir: string;
  archivePath: string;
  entryPointSource: string;
  /** Name the compiled entry point gets in dist and at the archive root. */
  entryPointName: string;
  helpersDir: string;
  excludedPackages: string[];
}

/**
 * Resolves every pipeline path against the project root. ARTIFACTS_DIR
 * overrides the output directory and may be relative or absolute.
 */
export function resolveSettings(projectRoot: string, env: NodeJS.ProcessEnv = process.env): PipelineSettings {
  const artifactsDir = path.resolve(projectRoot, env.ARTIFACTS_DIR || DEFAULT_ARTIFACTS_DIR);

  return {
    projectRoot,
    artifactsDir,
    distDir: path.join(artifactsDir, 'dist'),
    stagingDir: path.join(artifactsDir, 'nodejs'),
    archivePath: path.join(artifactsDir, ARCHIVE_NAME),
    entryPointSource: path.join(projectRoot, 'functions', 'index.ts'),
    entryPointName: 'index.js',
    helpersDir: path.join(projectRoot, 'layer', 'jwstascii-helpers'),
    excludedPackages: EXCLUDED_PACKAGES
  };
}

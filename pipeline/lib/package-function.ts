import * as fs from 'fs';
import * as path from 'path';
import { writeArchive } from './archive';
import type { BuildResult } from './build';
import { PipelineError, describeCause } from './errors';
import type { LayerResult } from './layer';
import type { PipelineLogger } from './logger';
import type { PipelineSettings } from './settings';

export interface PackageResult {
  archivePath: string;
  entries: number;
}

/**
 * Copies the entry point into the layer directory and zips the directory's
 * contents, so the entry point sits at the archive root beside node_modules.
 */
export async function packageFunction(
  settings: PipelineSettings,
  buildResult: BuildResult,
  layer: LayerResult,
  logger: PipelineLogger
): Promise<PackageResult> {
  const { archivePath } = settings;

  fs.rmSync(archivePath, { force: true });

  if (!fs.existsSync(buildResult.entryPointPath)) {
    throw new PipelineError('package', `Entry point not found: ${buildResult.entryPointPath}`);
  }

  try {
    fs.copyFileSync(buildResult.entryPointPath, path.join(layer.stagingDir, settings.entryPointName));

    logger.step(`Compressing ${layer.stagingDir}`);
    const entries = await writeArchive('zip', layer.stagingDir, archivePath);

    logger.success(`Packaged ${entries} entries into ${archivePath}`);
    return { archivePath, entries };
  } catch (error) {
    throw new PipelineError('package', `Packaging failed: ${describeCause(error)}`, { cause: error });
  }
}

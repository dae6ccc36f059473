#!/usr/bin/env node
import 'source-map-support/register';
import * as fs from 'fs';
import * as path from 'path';
import { isDeepStrictEqual } from 'util';
import { Command } from 'commander';
import * as yaml from 'js-yaml';
import { DEPLOYMENT_TARGET } from '../../lib/deployment-target';
import { ShellCommandRunner } from '../lib/command-runner';
import { lambdaUpdaterCiConfig, renderCiConfig } from '../lib/ci-workflow';
import { AwsArtifactPublisher, deployArchive, resolveAwsEnvironment } from '../lib/deploy';
import { PipelineError, describeCause } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { resolveSettings } from '../lib/settings';
import { runTarget } from '../lib/targets';
import type { PipelineTarget } from '../lib/targets';

/**
 * Packaging and deployment pipeline for the jwstascii updater function.
 *
 * Targets mirror the CI steps:
 *   build        bundle the helpers package and compile the entry point
 *   build_layer  install runtime dependencies into the layer directory
 *   package      zip the layer directory and entry point
 *   deploy       upload the archive to S3 and update the function code
 *
 * ARTIFACTS_DIR overrides the output directory (default: build).
 */

const projectRoot = path.join(__dirname, '..', '..');
const logger = createLogger('pipeline');

async function runPipelineTarget(target: PipelineTarget): Promise<void> {
  await runTarget(target, {
    settings: resolveSettings(projectRoot),
    runner: new ShellCommandRunner(),
    logger
  });
}

const program = new Command();

program
  .name('pipeline')
  .description('Build, package and deploy the jwstascii updater Lambda function');

program
  .command('build')
  .description('Build the helpers distribution and the entry point')
  .action(() => runPipelineTarget('build'));

program
  .command('build_layer')
  .description('Install runtime dependencies and the helpers distribution into the layer directory')
  .action(() => runPipelineTarget('build_layer'));

program
  .command('package')
  .description('Package the layer directory and entry point into the deployment archive')
  .action(() => runPipelineTarget('package'));

program
  .command('deploy')
  .description('Upload the deployment archive to S3 and point the function at it')
  .option('--archive <path>', 'archive to deploy (defaults to the packaged archive)')
  .action(async (options: { archive?: string }) => {
    const archivePath = options.archive
      ? path.resolve(options.archive)
      : resolveSettings(projectRoot).archivePath;
    const publisher = new AwsArtifactPublisher(resolveAwsEnvironment());
    await deployArchive(archivePath, DEPLOYMENT_TARGET, publisher, logger);
  });

program
  .command('ci_config')
  .description('Write .circleci/config.yml from the workflow model')
  .option('--check', 'fail if the committed config differs from the model')
  .action((options: { check?: boolean }) => {
    const configPath = path.join(projectRoot, '.circleci', 'config.yml');
    const config = lambdaUpdaterCiConfig();

    if (options.check) {
      const committed: unknown = fs.existsSync(configPath)
        ? yaml.load(fs.readFileSync(configPath, 'utf8'))
        : undefined;
      if (!isDeepStrictEqual(committed, config)) {
        throw new PipelineError('ci_config', `${configPath} is out of date; run npm run ci:config`);
      }
      logger.success(`${configPath} is up to date`);
      return;
    }

    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, renderCiConfig(config));
    logger.success(`Wrote ${configPath}`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof PipelineError) {
    logger.error(`${error.stage} failed: ${error.message}`);
  } else {
    logger.error(describeCause(error));
  }
  process.exit(1);
});

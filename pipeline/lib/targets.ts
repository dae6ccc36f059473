import { buildDistribution } from './build';
import type { BuildResult } from './build';
import type { CommandRunner } from './command-runner';
import { PipelineError } from './errors';
import { buildLayer } from './layer';
import type { LayerResult } from './layer';
import type { PipelineLogger } from './logger';
import { packageFunction } from './package-function';
import type { PackageResult } from './package-function';
import type { PipelineSettings } from './settings';

export type PipelineTarget = 'build' | 'build_layer' | 'package';

export const PIPELINE_TARGETS: readonly PipelineTarget[] = ['build', 'build_layer', 'package'];

const PREREQUISITES: Record<PipelineTarget, PipelineTarget[]> = {
  build: [],
  build_layer: ['build'],
  package: ['build', 'build_layer']
};

export interface PipelineContext {
  settings: PipelineSettings;
  runner: CommandRunner;
  logger: PipelineLogger;
}

export interface PipelineOutputs {
  build?: BuildResult;
  layer?: LayerResult;
  archive?: PackageResult;
}

export function isPipelineTarget(value: string): value is PipelineTarget {
  return (PIPELINE_TARGETS as readonly string[]).includes(value);
}

/**
 * Prerequisites first, each target once, the requested target last.
 */
export function resolveTargetOrder(target: PipelineTarget): PipelineTarget[] {
  const order: PipelineTarget[] = [];
  const visit = (current: PipelineTarget): void => {
    if (order.includes(current)) {
      return;
    }
    PREREQUISITES[current].forEach(visit);
    order.push(current);
  };
  visit(target);
  return order;
}

function requireOutput<T>(value: T | undefined, stage: PipelineTarget, missing: string): T {
  if (value === undefined) {
    throw new PipelineError(stage, `${stage} ran without ${missing}`);
  }
  return value;
}

/**
 * Runs a target and its prerequisites in order. The first failure rejects
 * and nothing after it runs.
 */
export async function runTarget(target: PipelineTarget, context: PipelineContext): Promise<PipelineOutputs> {
  const { settings, runner, logger } = context;
  const outputs: PipelineOutputs = {};

  for (const step of resolveTargetOrder(target)) {
    logger.info(`Running ${step}`);
    switch (step) {
      case 'build':
        outputs.build = await buildDistribution(settings, logger);
        break;
      case 'build_layer':
        outputs.layer = await buildLayer(settings, requireOutput(outputs.build, step, 'build output'), runner, logger);
        break;
      case 'package':
        outputs.archive = await packageFunction(
          settings,
          requireOutput(outputs.build, step, 'build output'),
          requireOutput(outputs.layer, step, 'layer output'),
          logger
        );
        break;
    }
  }

  return outputs;
}

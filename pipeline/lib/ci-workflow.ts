import * as path from 'path';
import * as yaml from 'js-yaml';
import { ARCHIVE_NAME, DEFAULT_ARTIFACTS_DIR } from '../../lib/deployment-target';

/**
 * Typed model of the CircleCI 2.1 configuration. `.circleci/config.yml` is
 * rendered from `lambdaUpdaterCiConfig()` by the `ci_config` command.
 */

export interface RunStep {
  run: { name: string; command: string };
}

export interface PersistToWorkspaceStep {
  persist_to_workspace: { root: string; paths: string[] };
}

export interface AttachWorkspaceStep {
  attach_workspace: { at: string };
}

/** Built-in commands such as `checkout`, or orb commands without parameters. */
export type CommandStep = string;

export type CircleCiStep = CommandStep | RunStep | PersistToWorkspaceStep | AttachWorkspaceStep;

export interface CircleCiJob {
  docker: { image: string }[];
  steps: CircleCiStep[];
}

export type BranchPattern = string | string[];

export interface BranchFilter {
  only?: BranchPattern;
  ignore?: BranchPattern;
}

export interface WorkflowJobOptions {
  requires?: string[];
  filters?: { branches?: BranchFilter };
}

export type WorkflowJobEntry = string | Record<string, WorkflowJobOptions>;

export interface CircleCiWorkflow {
  jobs: WorkflowJobEntry[];
}

export interface CircleCiConfig {
  version: number;
  orbs: Record<string, string>;
  jobs: Record<string, CircleCiJob>;
  workflows: Record<string, CircleCiWorkflow>;
}

export const WORKFLOW_NAME = 'lambda_updater_ci';
export const DEPLOY_BRANCH = 'main';
export const NODE_IMAGE = 'cimg/node:20.11';

const ARCHIVE_WORKSPACE_PATH = path.posix.join(DEFAULT_ARTIFACTS_DIR, ARCHIVE_NAME);

const installDependencies: RunStep = { run: { name: 'Install dependencies', command: 'npm install' } };

export function lambdaUpdaterCiConfig(): CircleCiConfig {
  return {
    version: 2.1,
    orbs: {
      coveralls: 'coverallsapp/coveralls@2'
    },
    jobs: {
      build_and_test: {
        docker: [{ image: NODE_IMAGE }],
        steps: [
          'checkout',
          installDependencies,
          { run: { name: 'Run tests', command: 'npm run test:coverage' } },
          'coveralls/upload',
          { run: { name: 'Package the function', command: 'npm run package' } },
          { persist_to_workspace: { root: '.', paths: [ARCHIVE_WORKSPACE_PATH] } }
        ]
      },
      deploy: {
        docker: [{ image: NODE_IMAGE }],
        steps: [
          'checkout',
          { attach_workspace: { at: './' } },
          installDependencies,
          { run: { name: 'Deploy updated lambda function', command: 'npm run deploy' } }
        ]
      }
    },
    workflows: {
      [WORKFLOW_NAME]: {
        jobs: [
          'build_and_test',
          {
            deploy: {
              requires: ['build_and_test'],
              filters: { branches: { only: DEPLOY_BRANCH } }
            }
          }
        ]
      }
    }
  };
}

export const CI_CONFIG_HEADER = '# Generated by `npm run ci:config` from pipeline/lib/ci-workflow.ts. Do not edit by hand.\n';

export function renderCiConfig(config: CircleCiConfig): string {
  return CI_CONFIG_HEADER + yaml.dump(config, { lineWidth: -1, noRefs: true });
}

function toList(pattern: BranchPattern | undefined): string[] {
  if (pattern === undefined) return [];
  return Array.isArray(pattern) ? pattern : [pattern];
}

/**
 * CircleCI treats a pattern wrapped in slashes as a regular expression that
 * must match the whole branch name.
 */
function matchesPattern(pattern: string, branch: string): boolean {
  if (pattern.length > 2 && pattern.startsWith('/') && pattern.endsWith('/')) {
    return new RegExp(`^(?:${pattern.slice(1, -1)})$`).test(branch);
  }
  return pattern === branch;
}

export function branchAllowed(filter: BranchFilter | undefined, branch: string): boolean {
  if (!filter) {
    return true;
  }
  const only = toList(filter.only);
  if (only.length > 0 && !only.some(pattern => matchesPattern(pattern, branch))) {
    return false;
  }
  return !toList(filter.ignore).some(pattern => matchesPattern(pattern, branch));
}

function normalizeEntry(entry: WorkflowJobEntry): [string, WorkflowJobOptions] {
  if (typeof entry === 'string') {
    return [entry, {}];
  }
  const names = Object.keys(entry);
  if (names.length !== 1) {
    throw new Error(`Workflow job entries must name exactly one job, got: ${names.join(', ') || 'none'}`);
  }
  return [names[0], entry[names[0]]];
}

/**
 * Jobs a push to `branch` runs, in workflow order. A job runs when its
 * branch filter admits the branch and every job it requires runs.
 */
export function jobsToRun(config: CircleCiConfig, workflowName: string, branch: string): string[] {
  const workflow = config.workflows[workflowName];
  if (!workflow) {
    throw new Error(`Unknown workflow: ${workflowName}`);
  }

  const entries = new Map(workflow.jobs.map(normalizeEntry));
  const decided = new Map<string, boolean>();

  const runs = (name: string, trail: string[]): boolean => {
    const known = decided.get(name);
    if (known !== undefined) {
      return known;
    }
    const options = entries.get(name);
    if (!options) {
      throw new Error(`Workflow ${workflowName} requires unknown job: ${name}`);
    }
    if (trail.includes(name)) {
      throw new Error(`Workflow ${workflowName} has a requires cycle: ${[...trail, name].join(' -> ')}`);
    }
    const result = branchAllowed(options.filters?.branches, branch)
      && (options.requires ?? []).every(required => runs(required, [...trail, name]));
    decided.set(name, result);
    return result;
  };

  return [...entries.keys()].filter(name => runs(name, []));
}

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import * as yaml from 'js-yaml';
import {
  CI_CONFIG_HEADER,
  WORKFLOW_NAME,
  branchAllowed,
  jobsToRun,
  lambdaUpdaterCiConfig,
  renderCiConfig
} from '../ci-workflow';
import type { CircleCiConfig } from '../ci-workflow';

describe('lambdaUpdaterCiConfig', () => {
  const config = lambdaUpdaterCiConfig();

  it('runs build_and_test then deploy on main', () => {
    expect(jobsToRun(config, WORKFLOW_NAME, 'main')).toEqual(['build_and_test', 'deploy']);
  });

  it('skips deploy for a feature branch', () => {
    expect(jobsToRun(config, WORKFLOW_NAME, 'feature/new-charset')).toEqual(['build_and_test']);
  });

  it('persists the deployment archive for the deploy job', () => {
    expect(config.jobs.build_and_test.steps).toContainEqual({
      persist_to_workspace: { root: '.', paths: ['build/jwstascii-lambda-updater.zip'] }
    });
    expect(config.jobs.deploy.steps).toContainEqual({ attach_workspace: { at: './' } });
  });

  it('tests before packaging', () => {
    const commands = config.jobs.build_and_test.steps.flatMap(step =>
      typeof step === 'object' && 'run' in step ? [step.run.command] : []
    );
    expect(commands).toEqual(['npm install', 'npm run test:coverage', 'npm run package']);
  });

  it('matches the committed .circleci/config.yml', () => {
    const committed = readFileSync(join(__dirname, '..', '..', '..', '.circleci', 'config.yml'), 'utf8');
    expect(yaml.load(committed)).toEqual(config);
  });

  it('renders YAML that loads back to the model', () => {
    const rendered = renderCiConfig(config);
    expect(rendered.startsWith(CI_CONFIG_HEADER)).toBe(true);
    expect(yaml.load(rendered)).toEqual(config);
  });
});

describe('jobsToRun', () => {
  const config: CircleCiConfig = {
    version: 2.1,
    orbs: {},
    jobs: {},
    workflows: {
      release: {
        jobs: [
          { publish: { requires: ['test'], filters: { branches: { only: '/release\\/.*/' } } } },
          'test',
          { notify: { requires: ['publish'] } },
          { lint: { filters: { branches: { ignore: ['main', 'develop'] } } } }
        ]
      },
      broken: {
        jobs: [{ deploy: { requires: ['missing'] } }]
      }
    }
  };

  it('follows requires regardless of listing order', () => {
    expect(jobsToRun(config, 'release', 'release/1.2')).toEqual(['publish', 'test', 'notify', 'lint']);
  });

  it('skips jobs whose prerequisites are skipped', () => {
    expect(jobsToRun(config, 'release', 'main')).toEqual(['test']);
  });

  it('rejects unknown workflows and jobs', () => {
    expect(() => jobsToRun(config, 'nightly', 'main')).toThrow('Unknown workflow: nightly');
    expect(() => jobsToRun(config, 'broken', 'main')).toThrow('Workflow broken requires unknown job: missing');
  });
});

describe('branchAllowed', () => {
  it('admits every branch without a filter', () => {
    expect(branchAllowed(undefined, 'anything')).toBe(true);
  });

  it('matches only lists exactly', () => {
    expect(branchAllowed({ only: 'main' }, 'main')).toBe(true);
    expect(branchAllowed({ only: 'main' }, 'main-backup')).toBe(false);
  });

  it('treats slash-wrapped patterns as whole-name regular expressions', () => {
    expect(branchAllowed({ only: '/release\\/.*/' }, 'release/2024.1')).toBe(true);
    expect(branchAllowed({ only: '/release\\/.*/' }, 'hotfix/release/1')).toBe(false);
  });

  it('applies ignore after only', () => {
    expect(branchAllowed({ only: ['/feature\\/.*/'], ignore: 'feature/wip' }, 'feature/wip')).toBe(false);
    expect(branchAllowed({ only: ['/feature\\/.*/'], ignore: 'feature/wip' }, 'feature/ready')).toBe(true);
  });
});

#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { JwstAsciiUpdaterStack } from '../lib/jwstascii-updater-stack';
import { ConfigLoader } from '../lib/config-loader';
import type { UpdaterConfig } from '../lib/config-loader';

/**
 * jwstascii Updater CDK Application
 *
 * Deploys everything around the updater function: schedule, role, logging
 * and alarm. The function code itself is published by the CI deploy job.
 *
 * Configuration is loaded from config/config.example.yaml unless a path is
 * passed with `-c config=...`.
 */

const app = new cdk.App();

// Get environment from context or default to 'dev'
const environment: string = app.node.tryGetContext('environment') || 'dev';

// Get config path from context or use default
const configPath: string = app.node.tryGetContext('config') || './config/config.example.yaml';

let config: UpdaterConfig;
try {
  config = ConfigLoader.loadConfig(configPath);
  console.log(`✓ Configuration loaded successfully from ${configPath}`);
  console.log(`✓ Environment: ${environment}`);
  console.log(`✓ Schedule: ${config.schedule.cron_schedule}`);
} catch (error) {
  console.error('✗ Failed to load configuration:', error);
  process.exit(1);
}

// Get AWS account and region from environment or CDK context
const account = process.env.CDK_DEFAULT_ACCOUNT || app.node.tryGetContext('account');
const region = process.env.CDK_DEFAULT_REGION || app.node.tryGetContext('region') || 'us-east-1';

new JwstAsciiUpdaterStack(app, `JwstAsciiUpdater-${environment}`, {
  config,
  environment,
  env: {
    account,
    region
  },
  description: 'jwstascii - daily site updater Lambda',
  tags: {
    Environment: environment,
    Project: 'JwstAscii',
    CostCenter: 'Engineering'
  }
});

app.synth();

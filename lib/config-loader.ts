import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';
import { describeIssues, updaterEventSchema } from 'jwstascii-helpers';
import type { UpdaterEvent } from 'jwstascii-helpers';

/**
 * Configuration structure matching config.yaml schema
 */
export interface UpdaterConfig {
  version: string;
  function: FunctionConfig;
  schedule: ScheduleConfig;
  site: SiteConfig;
  event: ScheduledEventConfig;
  image_layer?: ImageLayerConfig;
}

export interface FunctionConfig {
  lambda_memory: number;
  lambda_timeout: number;
}

export interface ScheduleConfig {
  cron_schedule: string;
  enabled: boolean;
}

export interface SiteConfig {
  bucket_name: string;
}

/**
 * Event payload passed by the schedule. `s3_bucket` is filled from the site
 * section when the rule is created.
 */
export type ScheduledEventConfig = Omit<UpdaterEvent, 's3_bucket'>;

export interface ImageLayerConfig {
  arn?: string;
  asset_path?: string;
}

const scheduledEventSchema = updaterEventSchema.omit({ s3_bucket: true });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, message: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !value) {
    throw new Error(message);
  }
  return value;
}

function requireSection(config: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = config[name];
  if (!isRecord(section)) {
    throw new Error(`Configuration must include ${name} section`);
  }
  return section;
}

/**
 * Utility class to load and validate CDK configuration from YAML files
 */
export class ConfigLoader {
  /**
   * Load configuration from a YAML file
   * @param configPath Path to the configuration file
   * @returns Parsed and validated configuration
   */
  static loadConfig(configPath: string): UpdaterConfig {
    try {
      const resolvedPath = path.resolve(configPath);

      if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Configuration file not found: ${resolvedPath}`);
      }

      const fileContents = fs.readFileSync(resolvedPath, 'utf8');
      return this.parseConfig(yaml.load(fileContents));
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Validate a parsed YAML document and build the typed configuration
   */
  static parseConfig(document: unknown): UpdaterConfig {
    if (!isRecord(document)) {
      throw new Error('Configuration must be a YAML mapping');
    }

    if (typeof document.version !== 'string' || !document.version) {
      throw new Error('Configuration must include a version field');
    }

    const fn = requireSection(document, 'function');
    const memory = fn.lambda_memory;
    if (typeof memory !== 'number' || memory < 128 || memory > 10240) {
      throw new Error('Function lambda_memory must be a number between 128 and 10240');
    }
    const timeout = fn.lambda_timeout;
    if (typeof timeout !== 'number' || timeout < 1 || timeout > 900) {
      throw new Error('Function lambda_timeout must be a number between 1 and 900');
    }

    const schedule = requireSection(document, 'schedule');
    if (typeof schedule.cron_schedule !== 'string' || !schedule.cron_schedule) {
      throw new Error('Schedule configuration missing required field: cron_schedule');
    }
    const enabled = schedule.enabled ?? true;
    if (typeof enabled !== 'boolean') {
      throw new Error('Schedule enabled must be a boolean');
    }

    const site = requireSection(document, 'site');
    if (typeof site.bucket_name !== 'string' || !site.bucket_name) {
      throw new Error('Site configuration missing required field: bucket_name');
    }

    const event = scheduledEventSchema.safeParse(requireSection(document, 'event'));
    if (!event.success) {
      throw new Error(`Event configuration is invalid: ${describeIssues(event.error).join('; ')}`);
    }

    const config: UpdaterConfig = {
      version: document.version,
      function: { lambda_memory: memory, lambda_timeout: timeout },
      schedule: { cron_schedule: schedule.cron_schedule, enabled },
      site: { bucket_name: site.bucket_name },
      event: event.data
    };

    if (document.image_layer !== undefined) {
      config.image_layer = this.parseImageLayer(document.image_layer);
    }

    return config;
  }

  private static parseImageLayer(section: unknown): ImageLayerConfig {
    if (!isRecord(section)) {
      throw new Error('Configuration image_layer must be a mapping');
    }
    const arn = optionalString(section.arn, 'Image layer arn must be a layer version ARN');
    if (arn !== undefined && !arn.startsWith('arn:')) {
      throw new Error('Image layer arn must be a layer version ARN');
    }
    const assetPath = optionalString(section.asset_path, 'Image layer asset_path must be a non-empty string');
    if (arn !== undefined && assetPath !== undefined) {
      throw new Error('Image layer takes either arn or asset_path, not both');
    }
    return { arn, asset_path: assetPath };
  }
}

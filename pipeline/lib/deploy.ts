import * as fs from 'fs';
import { LambdaClient, UpdateFunctionCodeCommand } from '@aws-sdk/client-lambda';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { DeploymentTarget } from '../../lib/deployment-target';
import { PipelineError, describeCause } from './errors';
import type { PipelineLogger } from './logger';

/**
 * Credentials and region injected by the CI platform's secret store.
 */
export interface AwsEnvironment {
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
}

export interface FunctionCodeUpdate {
  codeSha256?: string;
  lastUpdateStatus?: string;
}

export interface ArtifactPublisher {
  uploadArchive(bucket: string, key: string, body: Buffer): Promise<void>;
  updateFunctionCode(functionName: string, bucket: string, key: string): Promise<FunctionCodeUpdate>;
}

export interface DeployResult {
  location: string;
  functionName: string;
  update: FunctionCodeUpdate;
}

export function resolveAwsEnvironment(env: NodeJS.ProcessEnv = process.env): AwsEnvironment {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
  const region = env.AWS_DEFAULT_REGION || env.AWS_REGION;

  const missing: string[] = [];
  if (!accessKeyId) missing.push('AWS_ACCESS_KEY_ID');
  if (!secretAccessKey) missing.push('AWS_SECRET_ACCESS_KEY');
  if (!region) missing.push('AWS_DEFAULT_REGION');

  if (!accessKeyId || !secretAccessKey || !region) {
    throw new PipelineError('deploy', `Missing AWS environment variables: ${missing.join(', ')}`);
  }
  return { accessKeyId, secretAccessKey, region };
}

/**
 * Publishes through the AWS SDK using the resolved environment credentials.
 */
export class AwsArtifactPublisher implements ArtifactPublisher {
  private readonly s3: S3Client;
  private readonly lambda: LambdaClient;

  constructor(environment: AwsEnvironment) {
    const config = {
      region: environment.region,
      credentials: {
        accessKeyId: environment.accessKeyId,
        secretAccessKey: environment.secretAccessKey
      }
    };
    this.s3 = new S3Client(config);
    this.lambda = new LambdaClient(config);
  }

  async uploadArchive(bucket: string, key: string, body: Buffer): Promise<void> {
    await this.s3.send(new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: 'application/zip'
    }));
  }

  async updateFunctionCode(functionName: string, bucket: string, key: string): Promise<FunctionCodeUpdate> {
    const response = await this.lambda.send(new UpdateFunctionCodeCommand({
      FunctionName: functionName,
      S3Bucket: bucket,
      S3Key: key
    }));
    return { codeSha256: response.CodeSha256, lastUpdateStatus: response.LastUpdateStatus };
  }
}

/**
 * Uploads the archive to its fixed object and points the function at it.
 * There is no rollback: if the update call fails, the previously deployed
 * code stays live.
 */
export async function deployArchive(
  archivePath: string,
  target: DeploymentTarget,
  publisher: ArtifactPublisher,
  logger: PipelineLogger
): Promise<DeployResult> {
  if (!fs.existsSync(archivePath)) {
    throw new PipelineError('deploy', `Deployment archive not found: ${archivePath}`);
  }

  const location = `s3://${target.bucketName}/${target.objectKey}`;
  const body = fs.readFileSync(archivePath);

  try {
    logger.step(`Uploading ${archivePath} to ${location}`);
    await publisher.uploadArchive(target.bucketName, target.objectKey, body);
  } catch (error) {
    throw new PipelineError('deploy', `Upload to ${location} failed: ${describeCause(error)}`, { cause: error });
  }

  let update: FunctionCodeUpdate;
  try {
    logger.step(`Updating function ${target.functionName}`);
    update = await publisher.updateFunctionCode(target.functionName, target.bucketName, target.objectKey);
  } catch (error) {
    throw new PipelineError(
      'deploy',
      `Update of ${target.functionName} failed: ${describeCause(error)}`,
      { cause: error }
    );
  }

  logger.success(`Deployed ${location} to ${target.functionName}`);
  return { location, functionName: target.functionName, update };
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DEPLOYMENT_TARGET } from '../../../lib/deployment-target';
import { deployArchive, resolveAwsEnvironment } from '../deploy';
import type { ArtifactPublisher, FunctionCodeUpdate } from '../deploy';
import { PipelineError } from '../errors';
import { createLoggerStub } from './fixtures';

class FakePublisher implements ArtifactPublisher {
  readonly calls: string[] = [];
  uploaded?: { bucket: string; key: string; body: Buffer };

  constructor(private readonly failing?: 'upload' | 'update') {}

  async uploadArchive(bucket: string, key: string, body: Buffer): Promise<void> {
    this.calls.push(`upload ${bucket}/${key}`);
    if (this.failing === 'upload') {
      throw new Error('AccessDenied');
    }
    this.uploaded = { bucket, key, body };
  }

  async updateFunctionCode(functionName: string, bucket: string, key: string): Promise<FunctionCodeUpdate> {
    this.calls.push(`update ${functionName} from ${bucket}/${key}`);
    if (this.failing === 'update') {
      throw new Error('ResourceConflictException');
    }
    return { codeSha256: 'test-sha', lastUpdateStatus: 'InProgress' };
  }
}

describe('deployArchive', () => {
  let dir: string;
  let archivePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'deploy-test-'));
    archivePath = join(dir, 'jwstascii-lambda-updater.zip');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('uploads the archive to the fixed object, then updates the function from it', async () => {
    writeFileSync(archivePath, 'zip bytes');
    const publisher = new FakePublisher();

    const result = await deployArchive(archivePath, DEPLOYMENT_TARGET, publisher, createLoggerStub());

    expect(publisher.calls).toEqual([
      'upload jwstascii-lambda-updater/jwstascii-lambda-updater.zip',
      'update jwstascii-updater from jwstascii-lambda-updater/jwstascii-lambda-updater.zip'
    ]);
    expect(publisher.uploaded?.body.toString()).toBe('zip bytes');
    expect(result).toEqual({
      location: 's3://jwstascii-lambda-updater/jwstascii-lambda-updater.zip',
      functionName: 'jwstascii-updater',
      update: { codeSha256: 'test-sha', lastUpdateStatus: 'InProgress' }
    });
  });

  it('fails before any upload when the archive is missing', async () => {
    const publisher = new FakePublisher();

    await expect(deployArchive(archivePath, DEPLOYMENT_TARGET, publisher, createLoggerStub()))
      .rejects.toThrow(`Deployment archive not found: ${archivePath}`);
    expect(publisher.calls).toEqual([]);
  });

  it('does not update the function when the upload fails', async () => {
    writeFileSync(archivePath, 'zip bytes');
    const publisher = new FakePublisher('upload');

    await expect(deployArchive(archivePath, DEPLOYMENT_TARGET, publisher, createLoggerStub()))
      .rejects.toThrow('Upload to s3://jwstascii-lambda-updater/jwstascii-lambda-updater.zip failed: AccessDenied');
    expect(publisher.calls).toHaveLength(1);
  });

  it('reports a failed update as a deploy error', async () => {
    writeFileSync(archivePath, 'zip bytes');

    const deploy = deployArchive(archivePath, DEPLOYMENT_TARGET, new FakePublisher('update'), createLoggerStub());

    await expect(deploy).rejects.toBeInstanceOf(PipelineError);
    await expect(deploy).rejects.toMatchObject({
      stage: 'deploy',
      message: 'Update of jwstascii-updater failed: ResourceConflictException'
    });
  });
});

describe('resolveAwsEnvironment', () => {
  it('reads the credentials and default region', () => {
    expect(resolveAwsEnvironment({
      AWS_ACCESS_KEY_ID: 'test-key-id',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_DEFAULT_REGION: 'eu-west-1'
    })).toEqual({ accessKeyId: 'test-key-id', secretAccessKey: 'test-secret', region: 'eu-west-1' });
  });

  it('falls back to AWS_REGION', () => {
    expect(resolveAwsEnvironment({
      AWS_ACCESS_KEY_ID: 'test-key-id',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_REGION: 'us-east-2'
    }).region).toBe('us-east-2');
  });

  it('names every missing variable', () => {
    expect(() => resolveAwsEnvironment({ AWS_ACCESS_KEY_ID: 'test-key-id' }))
      .toThrow('Missing AWS environment variables: AWS_SECRET_ACCESS_KEY, AWS_DEFAULT_REGION');
  });
});

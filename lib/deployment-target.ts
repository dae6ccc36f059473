/**
 * Fixed locations shared by the packaging pipeline, the deploy step and the
 * CDK stack. Every deploy overwrites the same object.
 */
export const ARCHIVE_NAME = 'jwstascii-lambda-updater.zip';

export const DEFAULT_ARTIFACTS_DIR = 'build';

export interface DeploymentTarget {
  readonly bucketName: string;
  readonly objectKey: string;
  readonly functionName: string;
}

export const DEPLOYMENT_TARGET: DeploymentTarget = {
  bucketName: 'jwstascii-lambda-updater',
  objectKey: ARCHIVE_NAME,
  functionName: 'jwstascii-updater'
};

export const FUNCTION_HANDLER = 'index.handler';

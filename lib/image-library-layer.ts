import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as path from 'path';
import type { ImageLayerConfig } from './config-loader';

/**
 * Image Library Layer Construct
 *
 * Supplies the image-processing library (sharp and its @img/sharp-* native
 * binaries) that the packaging pipeline strips from the function archive.
 * The binaries have to match the Lambda architecture, so they ship in their
 * own layer instead of whatever the build machine installed.
 *
 * Either imports an existing layer version by ARN, or publishes one from a
 * directory laid out as `nodejs/node_modules/...`.
 */
export class ImageLibraryLayer extends Construct {
  public readonly layer: lambda.ILayerVersion;

  constructor(scope: Construct, id: string, environment: string, config: ImageLayerConfig) {
    super(scope, id);

    if (config.arn) {
      this.layer = lambda.LayerVersion.fromLayerVersionArn(this, 'ImportedImageLibraryLayer', config.arn);
      return;
    }

    if (!config.asset_path) {
      throw new Error('Image library layer needs either arn or asset_path');
    }

    const layer = new lambda.LayerVersion(this, 'ImageLibraryLayer', {
      layerVersionName: `jwstascii-image-library-${environment}`,
      code: lambda.Code.fromAsset(path.resolve(config.asset_path)),
      compatibleRuntimes: [lambda.Runtime.NODEJS_20_X],
      compatibleArchitectures: [lambda.Architecture.X86_64],
      description: 'sharp image library built for the Lambda Node.js 20 x86_64 runtime',
      removalPolicy: cdk.RemovalPolicy.RETAIN
    });

    cdk.Tags.of(layer).add('Environment', environment);
    cdk.Tags.of(layer).add('Project', 'JwstAscii');
    cdk.Tags.of(layer).add('Component', 'LambdaLayer');

    this.layer = layer;
  }
}

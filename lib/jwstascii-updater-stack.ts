import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import type { UpdaterConfig } from './config-loader';
import { DEPLOYMENT_TARGET, FUNCTION_HANDLER } from './deployment-target';
import { ImageLibraryLayer } from './image-library-layer';

/**
 * Props for JwstAsciiUpdaterStack
 */
export interface JwstAsciiUpdaterStackProps extends cdk.StackProps {
  config: UpdaterConfig;
  environment?: string;
}

/**
 * Updater Stack for the jwstascii site
 *
 * This stack runs the daily site update:
 * - Lambda function whose code is the archive the CI deploy job uploads to S3
 * - EventBridge scheduled rule that invokes it with the updater event
 * - IAM role allowed to read the deploy key secret and write site images
 * - CloudWatch log group and error alarm
 *
 * The CI deploy job replaces the function code in place; this stack owns
 * everything around it.
 */
export class JwstAsciiUpdaterStack extends cdk.Stack {
  public readonly updaterFunction: lambda.Function;
  public readonly scheduleRule: events.Rule;

  constructor(scope: Construct, id: string, props: JwstAsciiUpdaterStackProps) {
    super(scope, id, props);

    const environment = props.environment || 'dev';
    const config = props.config;

    // Artifact bucket is created outside this stack: the code object has to
    // exist before the function that loads it
    const artifactBucket = s3.Bucket.fromBucketName(this, 'ArtifactBucket', DEPLOYMENT_TARGET.bucketName);
    const siteBucket = s3.Bucket.fromBucketName(this, 'SiteBucket', config.site.bucket_name);

    const logGroup = new logs.LogGroup(this, 'UpdaterLogGroup', {
      logGroupName: `/aws/lambda/${DEPLOYMENT_TARGET.functionName}`,
      retention: logs.RetentionDays.ONE_WEEK,
      removalPolicy: cdk.RemovalPolicy.DESTROY
    });

    const lambdaRole = new iam.Role(this, 'UpdaterLambdaRole', {
      roleName: `JwstAsciiUpdaterLambda-${environment}`,
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
      description: 'Execution role for the jwstascii updater Lambda',
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaBasicExecutionRole')
      ]
    });

    // Deploy key for pushing to the site repository
    lambdaRole.addToPolicy(new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: [
        'secretsmanager:GetSecretValue'
      ],
      resources: [
        `arn:aws:secretsmanager:${this.region}:${this.account}:secret:${config.event.key_name}-*`
      ]
    }));

    siteBucket.grantPut(lambdaRole, 'images/*');

    const layers: lambda.ILayerVersion[] = [];
    if (config.image_layer) {
      layers.push(new ImageLibraryLayer(this, 'ImageLibraryLayer', environment, config.image_layer).layer);
    }

    this.updaterFunction = new lambda.Function(this, 'UpdaterFunction', {
      functionName: DEPLOYMENT_TARGET.functionName,
      runtime: lambda.Runtime.NODEJS_20_X,
      architecture: lambda.Architecture.X86_64,
      handler: FUNCTION_HANDLER,
      code: lambda.Code.fromBucket(artifactBucket, DEPLOYMENT_TARGET.objectKey),
      layers,
      role: lambdaRole,
      timeout: cdk.Duration.seconds(config.function.lambda_timeout),
      memorySize: config.function.lambda_memory,
      environment: {
        ENVIRONMENT: environment,
        LOG_LEVEL: 'INFO'
      },
      logGroup: logGroup,
      description: 'Publishes the daily ASCII rendering of the latest JWST image'
    });

    this.scheduleRule = new events.Rule(this, 'UpdaterSchedule', {
      ruleName: `jwstascii-updater-schedule-${environment}`,
      description: 'Triggers the jwstascii site update on a schedule',
      schedule: events.Schedule.expression(config.schedule.cron_schedule),
      enabled: config.schedule.enabled
    });

    this.scheduleRule.addTarget(new targets.LambdaFunction(this.updaterFunction, {
      event: events.RuleTargetInput.fromObject({
        ...config.event,
        s3_bucket: config.site.bucket_name
      }),
      retryAttempts: 0
    }));

    this.updaterFunction.metricErrors({
      period: cdk.Duration.hours(1),
      statistic: 'Sum'
    }).createAlarm(this, 'UpdaterErrorAlarm', {
      alarmName: `jwstascii-updater-errors-${environment}`,
      alarmDescription: 'Alarm when the jwstascii updater Lambda fails',
      threshold: 1,
      evaluationPeriods: 1,
      treatMissingData: cdk.aws_cloudwatch.TreatMissingData.NOT_BREACHING
    });

    new cdk.CfnOutput(this, 'UpdaterFunctionArn', {
      value: this.updaterFunction.functionArn,
      description: 'ARN of the jwstascii updater Lambda function',
      exportName: `${this.stackName}-UpdaterFunctionArn`
    });

    new cdk.CfnOutput(this, 'ScheduleRuleName', {
      value: this.scheduleRule.ruleName,
      description: 'Name of the EventBridge schedule rule',
      exportName: `${this.stackName}-ScheduleRuleName`
    });

    // Apply tags to all resources in the stack
    cdk.Tags.of(this).add('Environment', environment);
    cdk.Tags.of(this).add('Project', 'JwstAscii');
    cdk.Tags.of(this).add('ManagedBy', 'CDK');
  }
}

import * as cdk from 'aws-cdk-lib/core';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaNodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import * as path from 'path';

export interface MaintenanceJobsProps {
  readonly instance: ec2.IInstance;
  readonly namePrefix: string;
  /** EventBridge schedule expression for the patch compliance scan */
  readonly patchCheckSchedule: string;
  /** EventBridge schedule expression for Docker image pruning */
  readonly dockerCleanupSchedule: string;
  readonly imageRetentionHours: number;
  readonly logRetention: logs.RetentionDays;
}

interface ScheduledCommandJob {
  readonly id: string;
  readonly entry: string;
  readonly description: string;
  readonly schedule: string;
  readonly documentName: string;
  readonly environment?: Record<string, string>;
}

const LAMBDA_DIR = path.join(__dirname, '..', '..', 'lambda');

/**
 * Scheduled maintenance for the gateway host.
 *
 * Each job is a small Lambda function that sends a single SSM Run Command
 * to the instance and returns. It may only run its own document against
 * this instance.
 */
export class MaintenanceJobs extends Construct {
  public readonly patchCheckFunction: lambda.IFunction;
  public readonly dockerCleanupFunction: lambda.IFunction;

  constructor(scope: Construct, id: string, props: MaintenanceJobsProps) {
    super(scope, id);

    this.patchCheckFunction = this.createJob(props, {
      id: 'PatchCheck',
      entry: path.join(LAMBDA_DIR, 'patch-check', 'index.ts'),
      description: 'Runs an SSM patch compliance scan on the gateway instance',
      schedule: props.patchCheckSchedule,
      documentName: 'AWS-RunPatchBaseline',
    });

    this.dockerCleanupFunction = this.createJob(props, {
      id: 'DockerCleanup',
      entry: path.join(LAMBDA_DIR, 'docker-cleanup', 'index.ts'),
      description: 'Prunes unused Docker images and build cache on the gateway instance',
      schedule: props.dockerCleanupSchedule,
      documentName: 'AWS-RunShellScript',
      environment: {
        IMAGE_RETENTION_HOURS: String(props.imageRetentionHours),
      },
    });
  }

  private createJob(props: MaintenanceJobsProps, job: ScheduledCommandJob): lambda.IFunction {
    const stack = cdk.Stack.of(this);
    const functionName = `${props.namePrefix}-${toKebabCase(job.id)}`;

    const logGroup = new logs.LogGroup(this, `${job.id}LogGroup`, {
      logGroupName: `/aws/lambda/${functionName}`,
      retention: props.logRetention,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    const fn = new lambdaNodejs.NodejsFunction(this, `${job.id}Function`, {
      functionName,
      entry: job.entry,
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_22_X,
      architecture: lambda.Architecture.ARM_64,
      timeout: cdk.Duration.seconds(30),
      memorySize: 128,
      description: job.description,
      logGroup,
      environment: {
        INSTANCE_ID: props.instance.instanceId,
        LOG_LEVEL: 'info',
        ...job.environment,
      },
    });

    fn.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['ssm:SendCommand'],
        resources: [
          stack.formatArn({
            service: 'ec2',
            resource: 'instance',
            resourceName: props.instance.instanceId,
          }),
          stack.formatArn({
            service: 'ssm',
            account: '',
            resource: 'document',
            resourceName: job.documentName,
          }),
        ],
      })
    );

    new events.Rule(this, `${job.id}Schedule`, {
      ruleName: `${functionName}-schedule`,
      description: job.description,
      schedule: events.Schedule.expression(job.schedule),
      targets: [new targets.LambdaFunction(fn, { retryAttempts: 2 })],
    });

    return fn;
  }
}

function toKebabCase(id: string): string {
  return id.replace(/([a-z0-9])([A-Z])/g, '$1-$2').toLowerCase();
}

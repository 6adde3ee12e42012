import * as cdk from 'aws-cdk-lib/core';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as cloudwatchActions from 'aws-cdk-lib/aws-cloudwatch-actions';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as guardduty from 'aws-cdk-lib/aws-guardduty';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as subscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import * as cr from 'aws-cdk-lib/custom-resources';
import { Construct } from 'constructs';

export interface SecurityMonitoringProps {
  readonly instance: ec2.IInstance;
  readonly namePrefix: string;
  readonly enableGuardDuty: boolean;
  readonly enableInspector: boolean;
  readonly alarmEmail?: string;
}

/** GuardDuty findings at or above this severity are sent to the alarm topic */
export const FINDING_SEVERITY_THRESHOLD = 7;

/**
 * Security Monitoring
 *
 * - SNS topic for alarms and high-severity findings
 * - GuardDuty detector with EC2 runtime monitoring
 * - Inspector v2 vulnerability scanning for EC2
 * - CloudWatch alarms for CPU saturation and failed status checks
 *
 * GuardDuty and Inspector are account-wide; turn them off when the account
 * already has them enabled, otherwise the deployment conflicts.
 */
export class SecurityMonitoring extends Construct {
  public readonly alarmTopic: sns.Topic;
  public readonly detector?: guardduty.CfnDetector;

  constructor(scope: Construct, id: string, props: SecurityMonitoringProps) {
    super(scope, id);

    const { instance, namePrefix } = props;
    const stack = cdk.Stack.of(this);

    this.alarmTopic = new sns.Topic(this, 'AlarmTopic', {
      topicName: `${namePrefix}-security-alarms`,
      displayName: `${namePrefix} security alarms`,
      enforceSSL: true,
    });

    if (props.alarmEmail) {
      this.alarmTopic.addSubscription(new subscriptions.EmailSubscription(props.alarmEmail));
    }

    // ================================================================
    // GuardDuty
    // ================================================================
    if (props.enableGuardDuty) {
      this.detector = new guardduty.CfnDetector(this, 'Detector', {
        enable: true,
        findingPublishingFrequency: 'FIFTEEN_MINUTES',
        features: [
          {
            name: 'RUNTIME_MONITORING',
            status: 'ENABLED',
            additionalConfiguration: [{ name: 'EC2_AGENT_MANAGEMENT', status: 'ENABLED' }],
          },
        ],
      });
    }

    new events.Rule(this, 'GuardDutyFindingsRule', {
      ruleName: `${namePrefix}-guardduty-findings`,
      description: `GuardDuty findings with severity >= ${FINDING_SEVERITY_THRESHOLD}`,
      eventPattern: {
        source: ['aws.guardduty'],
        detailType: ['GuardDuty Finding'],
        detail: {
          severity: events.Match.greaterThanOrEqual(FINDING_SEVERITY_THRESHOLD),
        },
      },
      targets: [new targets.SnsTopic(this.alarmTopic)],
    });

    // ================================================================
    // Inspector v2 (no CloudFormation resource enables it)
    // ================================================================
    if (props.enableInspector) {
      const inspectorCall = (action: 'enable' | 'disable'): cr.AwsSdkCall => ({
        service: 'Inspector2',
        action,
        parameters: {
          accountIds: [stack.account],
          resourceTypes: ['EC2'],
        },
        physicalResourceId: cr.PhysicalResourceId.of(`${namePrefix}-inspector2-ec2`),
      });

      new cr.AwsCustomResource(this, 'InspectorEnabler', {
        onCreate: inspectorCall('enable'),
        onDelete: inspectorCall('disable'),
        policy: cr.AwsCustomResourcePolicy.fromStatements([
          new iam.PolicyStatement({
            actions: ['inspector2:Enable', 'inspector2:Disable', 'iam:CreateServiceLinkedRole'],
            resources: ['*'],
          }),
        ]),
        installLatestAwsSdk: false,
      });
    }

    // ================================================================
    // CloudWatch Alarms
    // ================================================================
    const alarmAction = new cloudwatchActions.SnsAction(this.alarmTopic);

    const cpuAlarm = new cloudwatch.Alarm(this, 'HighCpuAlarm', {
      alarmName: `${namePrefix}-high-cpu`,
      alarmDescription: 'Gateway instance CPU above 90% for 15 minutes',
      metric: new cloudwatch.Metric({
        namespace: 'AWS/EC2',
        metricName: 'CPUUtilization',
        dimensionsMap: { InstanceId: instance.instanceId },
        statistic: 'Average',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 90,
      evaluationPeriods: 3,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    cpuAlarm.addAlarmAction(alarmAction);

    const statusCheckAlarm = new cloudwatch.Alarm(this, 'SystemStatusCheckAlarm', {
      alarmName: `${namePrefix}-system-status-check`,
      alarmDescription: 'Recover the gateway instance when the system status check fails',
      metric: new cloudwatch.Metric({
        namespace: 'AWS/EC2',
        metricName: 'StatusCheckFailed_System',
        dimensionsMap: { InstanceId: instance.instanceId },
        statistic: 'Maximum',
        period: cdk.Duration.minutes(1),
      }),
      threshold: 1,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.MISSING,
    });
    statusCheckAlarm.addAlarmAction(
      new cloudwatchActions.Ec2Action(cloudwatchActions.Ec2InstanceAction.RECOVER),
      alarmAction
    );
  }
}

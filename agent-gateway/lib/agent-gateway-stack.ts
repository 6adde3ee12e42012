import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as cloudfront from 'aws-cdk-lib/aws-cloudfront';
import * as origins from 'aws-cdk-lib/aws-cloudfront-origins';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as targets from 'aws-cdk-lib/aws-elasticloadbalancingv2-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as route53Targets from 'aws-cdk-lib/aws-route53-targets';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import * as cr from 'aws-cdk-lib/custom-resources';
import { Construct } from 'constructs';
import { GatewayConfig, resourcePrefix, retentionFor } from './config';
import { EgressDnsFirewall } from './constructs/egress-dns-firewall';
import { MaintenanceJobs } from './constructs/maintenance-jobs';
import { SecurityMonitoring } from './constructs/security-monitoring';
import { createGatewayUserData } from './gateway-user-data';

export interface AgentGatewayStackProps extends cdk.StackProps {
  readonly config: GatewayConfig;
  /** ARN of the CLOUDFRONT-scope web ACL from the edge security stack */
  readonly webAclArn: string;
  /** us-east-1 certificate for the custom domain, when one is configured */
  readonly certificate?: acm.ICertificate;
}

/** Placeholder stored in the gateway secret until the operator sets real keys */
export const SECRET_PLACEHOLDER = 'REPLACE_ME';
export const GATEWAY_SECRET_KEYS = ['OPENAI_API_KEY', 'ANTHROPIC_API_KEY'] as const;

const CLOUDFRONT_ORIGIN_FACING_PREFIX_LIST = 'com.amazonaws.global.cloudfront.origin-facing';
const ALB_LISTENER_PORT = 80;

/**
 * AI Agent Gateway Stack
 *
 * Architecture:
 * ┌──────────────────────────────────────────────────────────────────┐
 * │                           INGRESS                               │
 * │  User → CloudFront (HTTPS) + WAF → VPC origin → internal ALB    │
 * └──────────────────────────────────────────────────────────────────┘
 *                               │
 * ┌──────────────────────────────────────────────────────────────────┐
 * │                     PRIVATE SUBNET                              │
 * │  EC2 (IMDSv2) → Docker: gateway + agent sandboxes               │
 * │  Secrets Manager → model API keys                               │
 * └──────────────────────────────────────────────────────────────────┘
 *                               │
 * ┌──────────────────────────────────────────────────────────────────┐
 * │                           EGRESS                                │
 * │  NAT Gateway, DNS Firewall: allowlisted domains, else NXDOMAIN  │
 * └──────────────────────────────────────────────────────────────────┘
 *
 * Side channels: EventBridge → Lambda → SSM (patch scan, image pruning);
 * GuardDuty, Inspector and CloudWatch alarms → SNS.
 */
export class AgentGatewayStack extends cdk.Stack {
  public readonly vpc: ec2.Vpc;
  public readonly dnsFirewall: EgressDnsFirewall;
  public readonly gatewaySecret: secretsmanager.Secret;
  public readonly instance: ec2.Instance;
  public readonly alb: elbv2.ApplicationLoadBalancer;
  public readonly distribution: cloudfront.Distribution;

  constructor(scope: Construct, id: string, props: AgentGatewayStackProps) {
    super(scope, id, props);

    const { config } = props;
    const prefix = resourcePrefix(config);
    const logRetention = retentionFor(config.logRetentionDays);
    const isProd = config.environment === 'prod';

    // ================================================================
    // VPC
    // ================================================================
    this.vpc = new ec2.Vpc(this, 'Vpc', {
      ipAddresses: ec2.IpAddresses.cidr(config.vpcCidr),
      maxAzs: 2, // Internal ALB needs two AZs
      natGateways: 1,
      subnetConfiguration: [
        {
          name: 'Public',
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: 24,
        },
        {
          name: 'Private',
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
          cidrMask: 24,
        },
      ],
      enableDnsHostnames: true,
      enableDnsSupport: true,
    });

    const flowLogGroup = new logs.LogGroup(this, 'FlowLogGroup', {
      logGroupName: `/${config.projectName}/${config.environment}/vpc-flow-logs`,
      retention: logRetention,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    this.vpc.addFlowLog('FlowLog', {
      destination: ec2.FlowLogDestination.toCloudWatchLogs(flowLogGroup),
      trafficType: ec2.FlowLogTrafficType.ALL,
    });

    // ================================================================
    // DNS Firewall (egress allowlist)
    // ================================================================
    const dnsQueryLogGroup = new logs.LogGroup(this, 'DnsQueryLogGroup', {
      logGroupName: `/${config.projectName}/${config.environment}/dns-queries`,
      retention: logRetention,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    this.dnsFirewall = new EgressDnsFirewall(this, 'DnsFirewall', {
      vpc: this.vpc,
      allowedDomains: config.allowedDomains,
      namePrefix: prefix,
      queryLogGroup: dnsQueryLogGroup,
    });

    // ================================================================
    // Security Groups
    // ================================================================

    // CloudFront's origin-facing prefix list ID differs per region
    const prefixListLookup = new cr.AwsCustomResource(this, 'CloudFrontPrefixListLookup', {
      onUpdate: {
        service: 'EC2',
        action: 'describeManagedPrefixLists',
        parameters: {
          Filters: [{ Name: 'prefix-list-name', Values: [CLOUDFRONT_ORIGIN_FACING_PREFIX_LIST] }],
        },
        physicalResourceId: cr.PhysicalResourceId.of(CLOUDFRONT_ORIGIN_FACING_PREFIX_LIST),
        outputPaths: ['PrefixLists.0.PrefixListId'],
      },
      policy: cr.AwsCustomResourcePolicy.fromSdkCalls({
        resources: cr.AwsCustomResourcePolicy.ANY_RESOURCE,
      }),
      installLatestAwsSdk: false,
    });

    const albSg = new ec2.SecurityGroup(this, 'AlbSecurityGroup', {
      vpc: this.vpc,
      description: 'Internal ALB - accepts HTTP from CloudFront VPC origin only',
      allowAllOutbound: false,
    });
    albSg.addIngressRule(
      ec2.Peer.prefixList(prefixListLookup.getResponseField('PrefixLists.0.PrefixListId')),
      ec2.Port.tcp(ALB_LISTENER_PORT),
      'Allow HTTP from CloudFront origin-facing servers'
    );

    const instanceSg = new ec2.SecurityGroup(this, 'InstanceSecurityGroup', {
      vpc: this.vpc,
      description: 'Gateway instance - accepts traffic from ALB only',
      allowAllOutbound: false,
    });
    instanceSg.addIngressRule(albSg, ec2.Port.tcp(config.gatewayPort), 'Allow gateway traffic from ALB');
    instanceSg.addEgressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(443), 'Allow HTTPS egress');
    instanceSg.addEgressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(80), 'Allow HTTP egress for package mirrors');
    albSg.addEgressRule(instanceSg, ec2.Port.tcp(config.gatewayPort), 'Allow ALB to reach gateway');

    // ================================================================
    // Secrets Manager
    // ================================================================
    this.gatewaySecret = new secretsmanager.Secret(this, 'GatewaySecret', {
      secretName: `${prefix}/gateway/api-keys`,
      description: 'Model provider API keys for the agent gateway',
      secretObjectValue: Object.fromEntries(
        GATEWAY_SECRET_KEYS.map((key) => [key, cdk.SecretValue.unsafePlainText(SECRET_PLACEHOLDER)])
      ),
      removalPolicy: isProd ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY,
    });

    // ================================================================
    // IAM Role for EC2
    // ================================================================
    const gatewayLogGroup = new logs.LogGroup(this, 'GatewayLogGroup', {
      logGroupName: `/${config.projectName}/${config.environment}/gateway`,
      retention: logRetention,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    const instanceRole = new iam.Role(this, 'InstanceRole', {
      assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
      description: 'Gateway instance role - SSM, CloudWatch, gateway secret',
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('CloudWatchAgentServerPolicy'),
      ],
    });
    this.gatewaySecret.grantRead(instanceRole);
    gatewayLogGroup.grantWrite(instanceRole);

    // ================================================================
    // EC2 Instance
    // ================================================================
    const patchGroup = `${prefix}-gateway`;

    this.instance = new ec2.Instance(this, 'GatewayInstance', {
      vpc: this.vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
      securityGroup: instanceSg,
      role: instanceRole,
      instanceType: new ec2.InstanceType(config.instanceType),
      machineImage: ec2.MachineImage.fromSsmParameter(
        '/aws/service/canonical/ubuntu/server/24.04/stable/current/arm64/hvm/ebs-gp3/ami-id',
        { os: ec2.OperatingSystemType.LINUX }
      ),
      blockDevices: [
        {
          deviceName: '/dev/sda1',
          volume: ec2.BlockDeviceVolume.ebs(config.rootVolumeSize, {
            volumeType: ec2.EbsDeviceVolumeType.GP3,
            encrypted: true,
            deleteOnTermination: true,
          }),
        },
      ],
      // Session token required; containers cannot reach the metadata endpoint
      requireImdsv2: true,
      userData: createGatewayUserData({
        projectName: config.projectName,
        region: this.region,
        secretArn: this.gatewaySecret.secretArn,
        logGroupName: gatewayLogGroup.logGroupName,
        gatewayImage: config.gatewayImage,
        gatewayPort: config.gatewayPort,
      }),
      userDataCausesReplacement: true,
      detailedMonitoring: true,
    });
    cdk.Tags.of(this.instance).add('Patch Group', patchGroup);

    // Resolver rules must be in place before the bootstrap script resolves anything
    this.instance.node.addDependency(this.dnsFirewall);

    // ================================================================
    // SSM Patch Baseline
    // ================================================================
    new ssm.CfnPatchBaseline(this, 'PatchBaseline', {
      name: `${prefix}-ubuntu`,
      description: 'Ubuntu patch baseline for the agent gateway',
      operatingSystem: 'UBUNTU',
      approvalRules: {
        patchRules: [
          {
            patchFilterGroup: {
              patchFilters: [
                { key: 'PRIORITY', values: ['Required', 'Important', 'Standard'] },
              ],
            },
            complianceLevel: 'HIGH',
          },
        ],
      },
      patchGroups: [patchGroup],
    });

    // ================================================================
    // Internal Application Load Balancer
    // ================================================================
    this.alb = new elbv2.ApplicationLoadBalancer(this, 'Alb', {
      vpc: this.vpc,
      internetFacing: false,
      securityGroup: albSg,
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
      dropInvalidHeaderFields: true,
    });

    const targetGroup = new elbv2.ApplicationTargetGroup(this, 'TargetGroup', {
      vpc: this.vpc,
      port: config.gatewayPort,
      protocol: elbv2.ApplicationProtocol.HTTP,
      targetType: elbv2.TargetType.INSTANCE,
      healthCheck: {
        path: config.healthCheckPath,
        interval: cdk.Duration.seconds(30),
        timeout: cdk.Duration.seconds(10),
        healthyThresholdCount: 2,
        unhealthyThresholdCount: 5,
        healthyHttpCodes: '200-399',
      },
      deregistrationDelay: cdk.Duration.seconds(30),
    });
    targetGroup.addTarget(new targets.InstanceTarget(this.instance, config.gatewayPort));

    this.alb.addListener('HttpListener', {
      port: ALB_LISTENER_PORT,
      protocol: elbv2.ApplicationProtocol.HTTP,
      defaultTargetGroups: [targetGroup],
      open: false,
    });

    // ================================================================
    // CloudFront (VPC origin → internal ALB)
    // ================================================================
    const customDomain = config.domainName && props.certificate
      ? { domainNames: [config.domainName], certificate: props.certificate }
      : {};

    this.distribution = new cloudfront.Distribution(this, 'Distribution', {
      comment: `${prefix} agent gateway`,
      defaultBehavior: {
        origin: origins.VpcOrigin.withApplicationLoadBalancer(this.alb, {
          vpcOriginName: `${prefix}-alb`,
          httpPort: ALB_LISTENER_PORT,
          protocolPolicy: cloudfront.OriginProtocolPolicy.HTTP_ONLY,
        }),
        viewerProtocolPolicy: cloudfront.ViewerProtocolPolicy.REDIRECT_TO_HTTPS,
        cachePolicy: cloudfront.CachePolicy.CACHING_DISABLED,
        originRequestPolicy: cloudfront.OriginRequestPolicy.ALL_VIEWER,
        allowedMethods: cloudfront.AllowedMethods.ALLOW_ALL,
        compress: true,
      },
      webAclId: props.webAclArn,
      minimumProtocolVersion: cloudfront.SecurityPolicyProtocol.TLS_V1_2_2021,
      httpVersion: cloudfront.HttpVersion.HTTP2_AND_3,
      priceClass: cloudfront.PriceClass.PRICE_CLASS_100,
      enabled: true,
      ...customDomain,
    });

    if (config.domainName && config.hostedZoneId) {
      const hostedZone = route53.HostedZone.fromHostedZoneAttributes(this, 'HostedZone', {
        hostedZoneId: config.hostedZoneId,
        zoneName: config.domainName,
      });

      new route53.ARecord(this, 'GatewayAliasRecord', {
        zone: hostedZone,
        recordName: config.domainName,
        target: route53.RecordTarget.fromAlias(new route53Targets.CloudFrontTarget(this.distribution)),
      });
    }

    // ================================================================
    // Maintenance Jobs & Security Monitoring
    // ================================================================
    new MaintenanceJobs(this, 'MaintenanceJobs', {
      instance: this.instance,
      namePrefix: prefix,
      patchCheckSchedule: config.patchCheckSchedule,
      dockerCleanupSchedule: config.dockerCleanupSchedule,
      imageRetentionHours: config.imageRetentionHours,
      logRetention,
    });

    new SecurityMonitoring(this, 'SecurityMonitoring', {
      instance: this.instance,
      namePrefix: prefix,
      enableGuardDuty: config.enableGuardDuty,
      enableInspector: config.enableInspector,
      alarmEmail: config.alarmEmail,
    });

    // ================================================================
    // Outputs
    // ================================================================
    const gatewayHost = config.domainName && props.certificate
      ? config.domainName
      : this.distribution.distributionDomainName;

    new cdk.CfnOutput(this, 'GatewayUrl', {
      value: `https://${gatewayHost}`,
      description: 'Public HTTPS endpoint of the agent gateway',
    });

    new cdk.CfnOutput(this, 'DistributionId', {
      value: this.distribution.distributionId,
      description: 'CloudFront distribution ID',
    });

    new cdk.CfnOutput(this, 'InstanceId', {
      value: this.instance.instanceId,
      description: 'Gateway EC2 instance ID',
    });

    new cdk.CfnOutput(this, 'SecretArn', {
      value: this.gatewaySecret.secretArn,
      description: 'Secrets Manager secret holding the model API keys',
    });

    new cdk.CfnOutput(this, 'SsmSessionCommand', {
      value: `aws ssm start-session --target ${this.instance.instanceId} --region ${this.region}`,
      description: 'Command to open a shell on the gateway via SSM Session Manager',
    });

    new cdk.CfnOutput(this, 'GatewayLogsCommand', {
      value: `aws logs tail ${gatewayLogGroup.logGroupName} --follow --region ${this.region}`,
      description: 'Command to follow the gateway container logs',
    });

    new cdk.CfnOutput(this, 'BlockedDnsQueriesCommand', {
      value: `aws logs tail ${dnsQueryLogGroup.logGroupName} --filter-pattern NXDOMAIN --since 1h --region ${this.region}`,
      description: 'Command to list DNS queries refused by the egress allowlist',
    });

    const secretTemplate = JSON.stringify(
      Object.fromEntries(GATEWAY_SECRET_KEYS.map((key) => [key, '...']))
    );
    new cdk.CfnOutput(this, 'UpdateSecretCommand', {
      value: `aws secretsmanager put-secret-value --secret-id ${this.gatewaySecret.secretArn} --secret-string '${secretTemplate}' --region ${this.region}`,
      description: 'Command to store the real API keys (restart the gateway service afterwards)',
    });

    new cdk.CfnOutput(this, 'PatchComplianceCommand', {
      value: `aws ssm list-compliance-items --resource-ids ${this.instance.instanceId} --resource-types ManagedInstance --filters Key=ComplianceType,Values=Patch --region ${this.region}`,
      description: 'Command to show the latest patch scan results',
    });
  }
}

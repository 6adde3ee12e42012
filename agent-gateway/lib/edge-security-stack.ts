import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as wafv2 from 'aws-cdk-lib/aws-wafv2';
import { Construct } from 'constructs';
import { GatewayConfig, resourcePrefix } from './config';
import { buildGatewayWafRules } from './waf-rules';

export interface EdgeSecurityStackProps extends cdk.StackProps {
  readonly config: GatewayConfig;
}

/**
 * Edge Security Stack (us-east-1)
 *
 * CloudFront only accepts web ACLs with CLOUDFRONT scope and ACM
 * certificates from us-east-1, whatever region the gateway runs in.
 * The gateway stack reads both through cross-region references.
 */
export class EdgeSecurityStack extends cdk.Stack {
  public readonly webAcl: wafv2.CfnWebACL;
  public readonly certificate?: acm.ICertificate;

  constructor(scope: Construct, id: string, props: EdgeSecurityStackProps) {
    super(scope, id, props);

    if (this.region !== 'us-east-1') {
      throw new Error(`Edge security stack must be deployed in us-east-1. Got: ${this.region}`);
    }

    const { config } = props;
    const prefix = resourcePrefix(config);

    // ================================================================
    // WAF Web ACL (CLOUDFRONT scope)
    // ================================================================
    this.webAcl = new wafv2.CfnWebACL(this, 'WebAcl', {
      name: `${prefix}-cloudfront-waf`,
      description: `WAF for ${prefix} CloudFront distribution`,
      scope: 'CLOUDFRONT',
      defaultAction: { allow: {} },
      visibilityConfig: {
        cloudWatchMetricsEnabled: true,
        metricName: `${prefix}-cloudfront-waf`,
        sampledRequestsEnabled: true,
      },
      rules: buildGatewayWafRules({
        rateLimit: config.wafRateLimit,
        metricPrefix: prefix,
      }),
    });

    // ================================================================
    // ACM Certificate (optional custom domain)
    // ================================================================
    if (config.domainName && config.hostedZoneId) {
      const hostedZone = route53.HostedZone.fromHostedZoneAttributes(this, 'HostedZone', {
        hostedZoneId: config.hostedZoneId,
        zoneName: config.domainName,
      });

      this.certificate = new acm.Certificate(this, 'Certificate', {
        domainName: config.domainName,
        validation: acm.CertificateValidation.fromDns(hostedZone),
      });
    }

    new cdk.CfnOutput(this, 'WebAclArn', {
      value: this.webAcl.attrArn,
      description: 'CloudFront WAF Web ACL ARN',
    });
  }
}

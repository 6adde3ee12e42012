import * as wafv2 from 'aws-cdk-lib/aws-wafv2';

export interface GatewayWafRuleOptions {
  /** Requests per 5-minute window per client IP before blocking */
  readonly rateLimit: number;
  /** Prefix for CloudWatch metric names */
  readonly metricPrefix: string;
}

const visibility = (metricName: string): wafv2.CfnWebACL.VisibilityConfigProperty => ({
  cloudWatchMetricsEnabled: true,
  metricName,
  sampledRequestsEnabled: true,
});

function managedRuleGroup(
  name: string,
  priority: number,
  metricPrefix: string,
  ruleActionOverrides?: wafv2.CfnWebACL.RuleActionOverrideProperty[]
): wafv2.CfnWebACL.RuleProperty {
  return {
    name,
    priority,
    overrideAction: { none: {} },
    statement: {
      managedRuleGroupStatement: {
        vendorName: 'AWS',
        name,
        ruleActionOverrides,
      },
    },
    visibilityConfig: visibility(`${metricPrefix}-${name}`),
  };
}

/**
 * Rules for the gateway's CloudFront web ACL, in evaluation order.
 *
 * Agent conversations routinely exceed the Common Rule Set's 8 KB body
 * limit, so SizeRestrictions_BODY only counts.
 */
export function buildGatewayWafRules(options: GatewayWafRuleOptions): wafv2.CfnWebACL.RuleProperty[] {
  const { rateLimit, metricPrefix } = options;

  return [
    managedRuleGroup('AWSManagedRulesAmazonIpReputationList', 1, metricPrefix),
    managedRuleGroup('AWSManagedRulesCommonRuleSet', 2, metricPrefix, [
      { name: 'SizeRestrictions_BODY', actionToUse: { count: {} } },
    ]),
    managedRuleGroup('AWSManagedRulesKnownBadInputsRuleSet', 3, metricPrefix),
    {
      name: 'RateLimitRule',
      priority: 4,
      action: { block: {} },
      statement: {
        rateBasedStatement: {
          limit: rateLimit,
          aggregateKeyType: 'IP',
        },
      },
      visibilityConfig: visibility(`${metricPrefix}-RateLimit`),
    },
  ];
}

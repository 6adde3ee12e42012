import * as cdk from 'aws-cdk-lib/core';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as route53resolver from 'aws-cdk-lib/aws-route53resolver';
import { Construct } from 'constructs';
import { assertPolicyOrdering, buildEgressPolicy, EgressPolicy } from '../egress/domain-policy';

export interface EgressDnsFirewallProps {
  readonly vpc: ec2.IVpc;
  /** Domain patterns the VPC may resolve; everything else gets NXDOMAIN */
  readonly allowedDomains: readonly string[];
  /** Prefix for firewall resource names */
  readonly namePrefix: string;
  /** Where DNS query logs go */
  readonly queryLogGroup: logs.ILogGroup;
}

/**
 * Route 53 Resolver DNS Firewall for the gateway VPC.
 *
 * Renders one domain list per policy rule and a rule group mirroring the
 * policy's priorities, actions and redirection handling. Policies whose
 * allow entries would be shadowed by an earlier block are rejected at
 * synth time.
 */
export class EgressDnsFirewall extends Construct {
  public readonly policy: EgressPolicy;
  public readonly ruleGroup: route53resolver.CfnFirewallRuleGroup;

  constructor(scope: Construct, id: string, props: EgressDnsFirewallProps) {
    super(scope, id);

    const { vpc, namePrefix, queryLogGroup } = props;

    this.policy = buildEgressPolicy(props.allowedDomains);
    assertPolicyOrdering(this.policy);

    const firewallRules = this.policy.rules.map((rule): route53resolver.CfnFirewallRuleGroup.FirewallRuleProperty => {
      const domainList = new route53resolver.CfnFirewallDomainList(this, `${toPascalCase(rule.name)}DomainList`, {
        name: `${namePrefix}-${rule.name}`,
        domains: [...rule.domains],
      });

      return {
        action: rule.action,
        priority: rule.priority,
        firewallDomainListId: domainList.attrId,
        blockResponse: rule.blockResponse,
        firewallDomainRedirectionAction: rule.redirectionAction,
      };
    });

    this.ruleGroup = new route53resolver.CfnFirewallRuleGroup(this, 'RuleGroup', {
      name: `${namePrefix}-egress-allowlist`,
      firewallRules,
    });

    // Association priority must fall between 100 and 9900 exclusive
    new route53resolver.CfnFirewallRuleGroupAssociation(this, 'VpcAssociation', {
      name: `${namePrefix}-egress-allowlist`,
      firewallRuleGroupId: this.ruleGroup.attrId,
      vpcId: vpc.vpcId,
      priority: 101,
      mutationProtection: 'DISABLED',
    });

    // ================================================================
    // DNS Query Logging
    // ================================================================
    const queryLogConfig = new route53resolver.CfnResolverQueryLoggingConfig(this, 'QueryLogConfig', {
      name: `${namePrefix}-dns-query-logs`,
      destinationArn: cdk.Stack.of(this).formatArn({
        service: 'logs',
        resource: 'log-group',
        resourceName: queryLogGroup.logGroupName,
        arnFormat: cdk.ArnFormat.COLON_RESOURCE_NAME,
      }),
    });

    new route53resolver.CfnResolverQueryLoggingConfigAssociation(this, 'QueryLogAssociation', {
      resolverQueryLogConfigId: queryLogConfig.attrId,
      resourceId: vpc.vpcId,
    });
  }
}

function toPascalCase(name: string): string {
  return name
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

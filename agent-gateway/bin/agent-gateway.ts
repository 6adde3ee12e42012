#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { AgentGatewayStack } from '../lib/agent-gateway-stack';
import { loadGatewayConfig, resourcePrefix } from '../lib/config';
import { EdgeSecurityStack } from '../lib/edge-security-stack';

/**
 * AI Agent Gateway on AWS
 *
 * Deploys a single-instance agent gateway behind CloudFront and WAF:
 * - CloudFront (HTTPS only) with a VPC origin on an internal ALB
 * - WAF (managed rules + rate limiting), us-east-1
 * - EC2 in a private subnet running the gateway and agent sandboxes in Docker
 * - Route 53 Resolver DNS Firewall: allowlisted domains resolve, all else NXDOMAIN
 * - Secrets Manager for model API keys
 * - EventBridge + Lambda + SSM for patch scans and Docker image pruning
 * - GuardDuty, Inspector and CloudWatch alarms
 *
 * Configuration is read from context, e.g.:
 *   cdk deploy --all -c environment=prod -c region=eu-west-1 \
 *     -c allowedDomains=api.openai.com,api.anthropic.com,*.amazonaws.com
 */

const app = new cdk.App();
const config = loadGatewayConfig(app);
const prefix = resourcePrefix(config);

const edge = new EdgeSecurityStack(app, `${prefix}-edge`, {
  env: {
    region: 'us-east-1',
    account: config.account,
  },
  description: `Edge security (CloudFront WAF) for ${prefix}`,
  crossRegionReferences: true,
  config,
});

const gateway = new AgentGatewayStack(app, `${prefix}-gateway`, {
  env: {
    region: config.region,
    account: config.account,
  },
  description: `AI agent gateway - CloudFront, WAF, private EC2, DNS egress allowlist (${config.environment})`,
  crossRegionReferences: true,
  config,
  webAclArn: edge.webAcl.attrArn,
  certificate: edge.certificate,
});
gateway.addDependency(edge);

cdk.Tags.of(app).add('Project', config.projectName);
cdk.Tags.of(app).add('Environment', config.environment);

app.synth();

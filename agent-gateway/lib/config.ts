import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import { z } from 'zod';
import { domainPatternProblem, normalizeDomain } from './egress/domain-policy';

/**
 * Gateway configuration
 *
 * Values come from CDK context (cdk.json or `cdk deploy -c key=value`).
 * Context passed on the command line always arrives as a string, so numbers,
 * booleans and lists are coerced before validation.
 */

export const ENVIRONMENTS = ['dev', 'staging', 'prod'] as const;
export type EnvironmentName = (typeof ENVIRONMENTS)[number];

/**
 * Domains the gateway host may resolve out of the box:
 * model APIs, container registries, Ubuntu archives and AWS endpoints
 * (SSM, Secrets Manager, CloudWatch Logs, the AWS CLI installer).
 */
export const DEFAULT_ALLOWED_DOMAINS: readonly string[] = [
  'api.openai.com',
  'api.anthropic.com',
  '*.amazonaws.com',
  'ghcr.io',
  'pkg-containers.githubusercontent.com',
  'registry-1.docker.io',
  'auth.docker.io',
  'production.cloudflare.docker.com',
  '*.ubuntu.com',
];

const LOG_RETENTION_BY_DAYS = new Map<number, logs.RetentionDays>([
  [1, logs.RetentionDays.ONE_DAY],
  [3, logs.RetentionDays.THREE_DAYS],
  [5, logs.RetentionDays.FIVE_DAYS],
  [7, logs.RetentionDays.ONE_WEEK],
  [14, logs.RetentionDays.TWO_WEEKS],
  [30, logs.RetentionDays.ONE_MONTH],
  [60, logs.RetentionDays.TWO_MONTHS],
  [90, logs.RetentionDays.THREE_MONTHS],
  [180, logs.RetentionDays.SIX_MONTHS],
  [365, logs.RetentionDays.ONE_YEAR],
]);

const REGION_PATTERN = /^[a-z]{2}(-gov|-iso[a-z]*)?-[a-z]+-\d{1,2}$/;
const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;
const GRAVITON_INSTANCE_PATTERN = /^[a-z]+\d+g[a-z]*\.[a-z0-9]+$/;
const SCHEDULE_PATTERN = /^(cron|rate)\(.+\)$/;

const fromString = (value: unknown): unknown => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
};

const listFromString = (value: unknown): unknown =>
  typeof value === 'string'
    ? value.split(',').map((item) => item.trim()).filter((item) => item.length > 0)
    : value;

const scheduleSchema = z
  .string()
  .regex(SCHEDULE_PATTERN, 'Schedule must be an EventBridge cron(...) or rate(...) expression.');

const isCidr = (value: string): boolean => {
  const match = CIDR_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const octets = match.slice(1, 5).map(Number);
  const prefix = Number(match[5]);
  return octets.every((octet) => octet <= 255) && prefix >= 16 && prefix <= 24;
};

export const gatewayConfigSchema = z
  .object({
    projectName: z
      .string()
      .regex(/^[a-z][a-z0-9-]{1,30}$/, 'Project name must be 2-31 lower-case letters, digits or dashes.')
      .default('agent-gateway'),
    environment: z
      .enum(ENVIRONMENTS, {
        errorMap: () => ({ message: 'Environment must be one of dev, staging or prod.' }),
      })
      .default('dev'),
    region: z
      .string({ required_error: 'Region must be a valid AWS region name such as us-east-1.' })
      .regex(REGION_PATTERN, 'Region must be a valid AWS region name such as us-east-1.'),
    account: z
      .string()
      .regex(/^\d{12}$/, 'Account must be a 12-digit AWS account ID.')
      .optional(),
    vpcCidr: z
      .string()
      .refine(isCidr, 'VPC CIDR must be an IPv4 block with a /16 to /24 prefix.')
      .default('10.0.0.0/16'),
    instanceType: z
      .string()
      .regex(GRAVITON_INSTANCE_PATTERN, 'Instance type must be a Graviton (arm64) type such as t4g.medium.')
      .default('t4g.medium'),
    rootVolumeSize: z.coerce.number().int().min(20).max(200).default(30),
    gatewayImage: z.string().min(1).default('ghcr.io/openclaw/openclaw:latest'),
    gatewayPort: z.coerce.number().int().min(1024).max(65535).default(18789),
    healthCheckPath: z
      .string()
      .startsWith('/', 'Health check path must start with "/".')
      .default('/'),
    allowedDomains: z
      .preprocess(
        listFromString,
        z
          .array(z.string().transform(normalizeDomain))
          .min(1, 'At least one egress domain must be allowed.')
      )
      .superRefine((domains, ctx) => {
        domains.forEach((domain, index) => {
          const problem = domainPatternProblem(domain);
          if (problem) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: problem });
          }
        });
      })
      .transform((domains) => [...new Set(domains)])
      .default([...DEFAULT_ALLOWED_DOMAINS]),
    wafRateLimit: z.coerce.number().int().min(100).max(2_000_000_000).default(1000),
    patchCheckSchedule: scheduleSchema.default('cron(0 3 * * ? *)'),
    dockerCleanupSchedule: scheduleSchema.default('cron(0 4 ? * SUN *)'),
    imageRetentionHours: z.coerce.number().int().min(1).max(8760).default(168),
    logRetentionDays: z.coerce
      .number()
      .int()
      .refine((days) => LOG_RETENTION_BY_DAYS.has(days), {
        message: `Log retention must be one of ${[...LOG_RETENTION_BY_DAYS.keys()].join(', ')} days.`,
      })
      .default(30),
    enableGuardDuty: z.preprocess(fromString, z.boolean()).default(true),
    enableInspector: z.preprocess(fromString, z.boolean()).default(true),
    alarmEmail: z.string().email('Alarm email must be a valid e-mail address.').optional(),
    domainName: z.string().min(1).optional(),
    hostedZoneId: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (Boolean(config.domainName) !== Boolean(config.hostedZoneId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['domainName'],
        message: 'domainName and hostedZoneId must be provided together.',
      });
    }
  });

export type GatewayConfig = Readonly<z.output<typeof gatewayConfigSchema>>;

export const CONFIG_CONTEXT_KEYS = [
  'projectName',
  'environment',
  'region',
  'vpcCidr',
  'instanceType',
  'rootVolumeSize',
  'gatewayImage',
  'gatewayPort',
  'healthCheckPath',
  'allowedDomains',
  'wafRateLimit',
  'patchCheckSchedule',
  'dockerCleanupSchedule',
  'imageRetentionHours',
  'logRetentionDays',
  'enableGuardDuty',
  'enableInspector',
  'alarmEmail',
  'domainName',
  'hostedZoneId',
] as const;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid gateway configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates raw configuration values and applies defaults.
 *
 * @throws ConfigValidationError listing every invalid field
 */
export function parseGatewayConfig(raw: Record<string, unknown>): GatewayConfig {
  const result = gatewayConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return Object.freeze(result.data);
}

/**
 * Reads the gateway configuration from the construct tree's context,
 * falling back to the CDK CLI's default account and region.
 */
export function loadGatewayConfig(
  scope: Construct,
  env: NodeJS.ProcessEnv = process.env
): GatewayConfig {
  const raw: Record<string, unknown> = {};
  for (const key of CONFIG_CONTEXT_KEYS) {
    const value: unknown = scope.node.tryGetContext(key);
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  raw.region ??= env.CDK_DEFAULT_REGION ?? 'us-east-1';
  if (env.CDK_DEFAULT_ACCOUNT) {
    raw.account = env.CDK_DEFAULT_ACCOUNT;
  }

  return parseGatewayConfig(raw);
}

export function retentionFor(days: number): logs.RetentionDays {
  const retention = LOG_RETENTION_BY_DAYS.get(days);
  if (retention === undefined) {
    throw new Error(`Unsupported log retention: ${days} days`);
  }
  return retention;
}

/**
 * Prefix for physical resource names, e.g. `agent-gateway-dev`.
 */
export function resourcePrefix(config: GatewayConfig): string {
  return `${config.projectName}-${config.environment}`;
}

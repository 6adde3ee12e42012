/**
 * Egress Domain Policy
 *
 * Pure model of the Route 53 Resolver DNS Firewall rules applied to the
 * gateway VPC. The EgressDnsFirewall construct renders CloudFormation from
 * this model, so the evaluation semantics below are the ones tested.
 *
 * Evaluation:
 * - Rules are evaluated by ascending priority; the first match wins
 * - ALLOW resolves the query, BLOCK answers with its block response
 * - A query no rule matches passes through to the resolver
 * - When an answer is a CNAME chain, each target is evaluated again unless
 *   the rule that allowed the previous name trusts its redirection targets
 *
 * Name resolution is the only thing filtered here. A workload that already
 * knows a destination IP address is not affected by this policy.
 */

export type FirewallAction = 'ALLOW' | 'BLOCK';
export type BlockResponse = 'NXDOMAIN';
export type QueryOutcome = 'RESOLVE' | BlockResponse;
export type RedirectionAction = 'INSPECT_REDIRECTION_DOMAIN' | 'TRUST_REDIRECTION_DOMAIN';

export interface FirewallRule {
  readonly name: string;
  readonly priority: number;
  readonly action: FirewallAction;
  readonly domains: readonly string[];
  readonly blockResponse?: BlockResponse;
  /** How CNAME/DNAME targets of a matched name are treated; DNS Firewall defaults to inspecting them */
  readonly redirectionAction?: RedirectionAction;
}

export interface EgressPolicy {
  readonly rules: readonly FirewallRule[];
}

export interface QueryDecision {
  readonly domain: string;
  readonly outcome: QueryOutcome;
  readonly matchedRule?: string;
}

export interface ShadowedAllowEntry {
  readonly rule: string;
  readonly domain: string;
  readonly shadowedBy: string;
}

export const ALLOW_RULE_PRIORITY = 100;
export const BLOCK_ALL_RULE_PRIORITY = 200;
export const WILDCARD_ALL = '*';

const WILDCARD_PREFIX = '*.';
const MAX_DOMAIN_LENGTH = 255;
const LABEL_PATTERN = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;

export class EgressPolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EgressPolicyError';
  }
}

/**
 * Lower-cases a domain name and strips surrounding whitespace and the
 * trailing root dot, so `API.OpenAI.com.` and `api.openai.com` compare equal.
 */
export function normalizeDomain(name: string): string {
  const trimmed = name.trim().toLowerCase();
  return trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed;
}

/**
 * Returns a description of what is wrong with a domain pattern, or
 * `undefined` when the pattern is usable in a firewall domain list.
 * The pattern is expected to be normalized already.
 */
export function domainPatternProblem(pattern: string): string | undefined {
  if (pattern.length === 0) {
    return 'Domain pattern must not be empty.';
  }
  if (pattern === WILDCARD_ALL) {
    return undefined;
  }
  if (pattern.length > MAX_DOMAIN_LENGTH) {
    return `Domain pattern must be at most ${MAX_DOMAIN_LENGTH} characters.`;
  }

  const name = pattern.startsWith(WILDCARD_PREFIX)
    ? pattern.slice(WILDCARD_PREFIX.length)
    : pattern;
  if (name.includes('*')) {
    return 'Wildcards are only allowed as the whole leftmost label (e.g. *.example.com).';
  }

  const labels = name.split('.');
  if (labels.some((label) => !LABEL_PATTERN.test(label))) {
    return 'Domain labels must be 1-63 characters of a-z, 0-9, "-" or "_" and must not start or end with "-".';
  }
  return undefined;
}

/**
 * Matches a normalized query name against one domain list entry.
 *
 * `*` matches every name, `*.example.com` matches strict subdomains of
 * example.com (not example.com itself), anything else is an exact match.
 */
export function matchesDomainPattern(pattern: string, domain: string): boolean {
  if (pattern === WILDCARD_ALL) {
    return true;
  }
  if (pattern.startsWith(WILDCARD_PREFIX)) {
    return domain.endsWith(pattern.slice(1));
  }
  return pattern === domain;
}

/**
 * Builds the two-rule allowlist policy:
 * priority 100 allows the listed domains, priority 200 blocks everything
 * else with NXDOMAIN.
 *
 * @throws EgressPolicyError when an allowlist entry is not a valid pattern
 */
export function buildEgressPolicy(allowlist: readonly string[]): EgressPolicy {
  const domains: string[] = [];
  for (const entry of allowlist) {
    const domain = normalizeDomain(entry);
    const problem = domainPatternProblem(domain);
    if (problem) {
      throw new EgressPolicyError(`Invalid allowlist entry "${entry}": ${problem}`);
    }
    if (!domains.includes(domain)) {
      domains.push(domain);
    }
  }

  return {
    rules: [
      {
        name: 'allow-listed-domains',
        priority: ALLOW_RULE_PRIORITY,
        action: 'ALLOW',
        domains,
        // Provider endpoints CNAME to CDN names that are not on the list
        redirectionAction: 'TRUST_REDIRECTION_DOMAIN',
      },
      {
        name: 'block-all-other-domains',
        priority: BLOCK_ALL_RULE_PRIORITY,
        action: 'BLOCK',
        domains: [WILDCARD_ALL],
        blockResponse: 'NXDOMAIN',
      },
    ],
  };
}

function byPriority(rules: readonly FirewallRule[]): FirewallRule[] {
  return [...rules].sort((a, b) => a.priority - b.priority);
}

function firstMatchingRule(policy: EgressPolicy, domain: string): FirewallRule | undefined {
  return byPriority(policy.rules).find((rule) =>
    rule.domains.some((pattern) => matchesDomainPattern(pattern, domain))
  );
}

function outcomeOf(rule: FirewallRule | undefined): QueryOutcome {
  if (!rule || rule.action === 'ALLOW') {
    return 'RESOLVE';
  }
  return rule.blockResponse ?? 'NXDOMAIN';
}

/**
 * Decides the outcome of a single DNS query under the policy.
 */
export function evaluateQuery(policy: EgressPolicy, queryName: string): QueryDecision {
  const domain = normalizeDomain(queryName);
  const rule = firstMatchingRule(policy, domain);

  return rule
    ? { domain, outcome: outcomeOf(rule), matchedRule: rule.name }
    : { domain, outcome: 'RESOLVE' };
}

/**
 * Decides the outcome of a query whose answer is a redirection chain:
 * `chain[0]` is the queried name, the rest are the CNAME/DNAME targets in
 * the order the resolver follows them.
 *
 * Evaluation stops at the first blocked name, or once a name is allowed by
 * a rule that trusts its redirection targets.
 */
export function evaluateResolutionChain(policy: EgressPolicy, chain: readonly string[]): QueryDecision {
  const [queryName, ...targets] = chain;
  if (queryName === undefined) {
    throw new EgressPolicyError('A resolution chain must start with the queried name.');
  }

  const domain = normalizeDomain(queryName);
  let rule = firstMatchingRule(policy, domain);

  for (const target of targets) {
    if (outcomeOf(rule) !== 'RESOLVE' || rule?.redirectionAction === 'TRUST_REDIRECTION_DOMAIN') {
      break;
    }
    rule = firstMatchingRule(policy, normalizeDomain(target));
  }

  return rule
    ? { domain, outcome: outcomeOf(rule), matchedRule: rule.name }
    : { domain, outcome: 'RESOLVE' };
}

// True when every name matched by `inner` is also matched by `outer`.
function patternCovers(outer: string, inner: string): boolean {
  if (outer === WILDCARD_ALL) {
    return true;
  }
  if (inner === WILDCARD_ALL) {
    return false;
  }
  if (inner.startsWith(WILDCARD_PREFIX)) {
    if (outer === inner) {
      return true;
    }
    return outer.startsWith(WILDCARD_PREFIX) && matchesDomainPattern(outer, inner.slice(2));
  }
  return matchesDomainPattern(outer, inner);
}

/**
 * Lists allow entries that can never take effect because a BLOCK rule with a
 * lower priority number already covers them.
 */
export function findShadowedAllowRules(policy: EgressPolicy): ShadowedAllowEntry[] {
  const ordered = byPriority(policy.rules);
  const shadowed: ShadowedAllowEntry[] = [];

  ordered.forEach((rule, index) => {
    if (rule.action !== 'ALLOW') {
      return;
    }
    const earlierBlocks = ordered
      .slice(0, index)
      .filter((earlier) => earlier.action === 'BLOCK' && earlier.priority < rule.priority);

    for (const domain of rule.domains) {
      const blocker = earlierBlocks.find((block) =>
        block.domains.some((pattern) => patternCovers(pattern, domain))
      );
      if (blocker) {
        shadowed.push({ rule: rule.name, domain, shadowedBy: blocker.name });
      }
    }
  });

  return shadowed;
}

/**
 * @throws EgressPolicyError on duplicate priorities or shadowed allow entries
 */
export function assertPolicyOrdering(policy: EgressPolicy): void {
  const seen = new Map<number, string>();
  for (const rule of policy.rules) {
    if (seen.has(rule.priority)) {
      throw new EgressPolicyError(
        `Rules "${seen.get(rule.priority)}" and "${rule.name}" share priority ${rule.priority}.`
      );
    }
    seen.set(rule.priority, rule.name);
  }

  const shadowed = findShadowedAllowRules(policy);
  if (shadowed.length > 0) {
    const detail = shadowed
      .map((entry) => `${entry.domain} (${entry.rule}) is blocked first by ${entry.shadowedBy}`)
      .join('; ');
    throw new EgressPolicyError(`Allowlisted domains are shadowed: ${detail}`);
  }
}
